/**
 * Color Detector
 *
 * Decides whether a content stream puts any color (as opposed to shades of
 * gray) on the page: color-setting operators, shadings, inline and XObject
 * images, and everything reachable through forms and colored tiling patterns.
 */

import { PdfParseError, UndefinedPatternError, UndefinedShadingError, UndefinedXObjectError, UnsupportedColorspaceError } from '../errors.js';
import { getLogger } from '../logger.js';
import { type Color, isPatternColor } from '../color/color.js';
import { componentCount, isGrayColorspace } from '../color/colorspace.js';
import { isColorColored } from '../color/predicates.js';
import { isRGBImageColored } from '../image/raster.js';
import { type ImageSource, decodeToRGB, inlineImageSource, xobjectImageSource } from '../image/image-source.js';
import type { Pattern, ResourceScope, Shading } from '../resources/types.js';
import type { ContentStream, ContentOperator } from '../content/operators.js';
import { getInlineImage, resourceName } from '../content/operators.js';
import { type OperatorHandler, processContentStream } from '../content/processor.js';
import { type DetectContext, type DetectOptions, createDetectContext, memoized } from './context.js';

/** True if `stream`, drawn with `resources`, contains color */
export function isColored(stream: ContentStream, resources: ResourceScope, options?: DetectOptions): boolean {
  return streamColored(stream, resources, createDetectContext(options));
}

/**
 * Uncolored tiling patterns take their color from the painting operator and
 * never add any; colored ones are judged by their content.
 */
export function isPatternColored(pattern: Pattern, options?: DetectOptions): boolean {
  return patternColored(pattern, createDetectContext(options));
}

/** A shading is judged by its colorspace alone: one component is gray, three or four are color. */
export function isShadingColored(shading: Shading): boolean {
  const n = componentCount(shading.colorspace);
  switch (n) {
    case 1:
      return false;
    case 3:
    case 4:
      return true;
    default:
      throw new UnsupportedColorspaceError(n);
  }
}

// ─── Traversal ───

function streamColored(stream: ContentStream, resources: ResourceScope, ctx: DetectContext): boolean {
  let colored = false;

  const onColor = (stroking: boolean): OperatorHandler => (op, state, scope) => {
    if (colored) return;
    const color = stroking ? state.strokingColor : state.nonStrokingColor;
    colored = colorColored(op, color, scope, ctx);
  };

  const stroke = onColor(true);
  const fill = onColor(false);

  processContentStream(stream, resources, {
    operators: {
      SC: stroke, SCN: stroke, RG: stroke, K: stroke,
      sc: fill, scn: fill, rg: fill, k: fill,

      sh: (op, _state, scope) => {
        if (colored) return;
        const name = resourceName(op);
        colored = memoized(ctx, scope, 'shading', name, () => {
          const shading = scope.getShading(name);
          if (!shading) throw new UndefinedShadingError(name);
          return isShadingColored(shading);
        });
      },

      BI: (op, _state, scope) => {
        if (colored) return;
        const image = getInlineImage(op.operands, 0);
        if (!image) throw new PdfParseError('BI without inline image data');
        colored = imageColored(inlineImageSource(image, scope), ctx);
      },

      Do: (op, _state, scope) => {
        if (colored) return;
        const name = resourceName(op);
        colored = memoized(ctx, scope, 'xobject', name, () => {
          const xobject = scope.getXObject(name);
          if (!xobject) throw new UndefinedXObjectError(name);
          if (xobject.kind === 'image') return imageColored(xobjectImageSource(xobject), ctx);
          const formScope = xobject.resources ?? scope;
          return ctx.guard.enter(xobject.content, `form /${name}`, () => streamColored(xobject.content, formScope, ctx), false);
        });
      },
    },
  });

  return colored;
}

function colorColored(op: ContentOperator, color: Color, scope: ResourceScope, ctx: DetectContext): boolean {
  if (!isPatternColor(color)) return isColorColored(color);

  if (color.underlying && isColorColored(color.underlying)) return true;
  if (color.name === '') throw new PdfParseError(`${op.name} without a pattern name`);
  return memoized(ctx, scope, 'pattern', color.name, () => {
    const pattern = scope.getPattern(color.name);
    if (!pattern) throw new UndefinedPatternError(color.name);
    return patternColored(pattern, ctx);
  });
}

function patternColored(pattern: Pattern, ctx: DetectContext): boolean {
  if (pattern.kind === 'shading') return isShadingColored(pattern.shading);
  if (!pattern.colored) return false;
  return ctx.guard.enter(
    pattern.content,
    'tiling pattern',
    () => streamColored(pattern.content, pattern.resources, ctx),
    false,
  );
}

function imageColored(source: ImageSource, ctx: DetectContext): boolean {
  switch (source.filter) {
    case 'JPXDecode':
      // JPEG 2000 data is not decoded
      return true;
    case 'CCITTFaxDecode':
    case 'JBIG2Decode':
      getLogger().debug(`Treating ${source.filter} image as gray`);
      return false;
  }
  if (isGrayColorspace(source.colorspace)) return false;
  return isRGBImageColored(decodeToRGB(source, ctx.codec).rgb);
}
