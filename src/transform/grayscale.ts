/**
 * Grayscale Transformer
 *
 * Rewrites a content stream so that everything it draws is gray. Color
 * operators are rewritten one for one; patterns, shadings, images and forms
 * are converted in the resource scope they are looked up in, which is
 * mutated in place and must be saved along with the returned stream.
 */

import { pdfName, pdfNumber } from '../parser/types.js';
import { PdfParseError, UndefinedPatternError, UndefinedShadingError, UndefinedXObjectError } from '../errors.js';
import { type Color, isPatternColor } from '../color/color.js';
import { type Colorspace, DEVICE_GRAY, isGrayColorspace } from '../color/colorspace.js';
import { colorToGray } from '../color/convert.js';
import { type ImageCodec, defaultImageCodec } from '../image/codec.js';
import type { Pattern, ResourceScope } from '../resources/types.js';
import { type ContentOperator, type ContentStream, getInlineImage, getName, op, resourceName } from '../content/operators.js';
import type { GraphicsState } from '../content/graphics-state.js';
import { processContentStream } from '../content/processor.js';
import { DEFAULT_MAX_DEPTH, NestingGuard, VisitedSet } from '../content/traversal.js';
import { convertImageToGray, convertInlineImageToGray } from './image.js';
import { convertShadingToGray } from './shading.js';

export interface GrayscaleOptions {
  /** Image codec used to decode and re-encode images (default: the built-in codec) */
  codec?: ImageCodec;
  /** Deepest nesting of forms and tiling patterns that is followed (default: 32) */
  maxDepth?: number;
}

interface TransformContext {
  readonly codec: ImageCodec;
  /** Resources already converted during this call */
  readonly done: VisitedSet<true>;
  readonly guard: NestingGuard;
  /**
   * Pattern colorspaces to switch to a gray underlying space. Applied once the
   * whole call is done, since later operators are still read against the
   * original component count.
   */
  readonly colorspaceWrites: Array<() => void>;
}

/**
 * Convert `stream` to grayscale. Returns the rewritten stream; patterns,
 * shadings, XObjects and pattern colorspaces it uses are replaced in
 * `resources` (or in the nested scopes they are defined in).
 */
export function toGrayscale(
  stream: ContentStream,
  resources: ResourceScope,
  options: GrayscaleOptions = {},
): ContentOperator[] {
  return withContext(options, (ctx) => transformStream(stream, resources, ctx));
}

/** The gray version of a pattern: colored tiling content is rewritten, shadings are converted */
export function convertPatternToGray(pattern: Pattern, options: GrayscaleOptions = {}): Pattern {
  return withContext(options, (ctx) => patternToGray(pattern, ctx));
}

function withContext<T>(options: GrayscaleOptions, fn: (ctx: TransformContext) => T): T {
  const ctx: TransformContext = {
    codec: options.codec ?? defaultImageCodec,
    done: new VisitedSet(),
    guard: new NestingGuard(options.maxDepth ?? DEFAULT_MAX_DEPTH),
    colorspaceWrites: [],
  };
  const result = fn(ctx);
  for (const write of ctx.colorspaceWrites) write();
  return result;
}

// ─── Traversal ───

function transformStream(stream: ContentStream, resources: ResourceScope, ctx: TransformContext): ContentOperator[] {
  const out: ContentOperator[] = [];
  processContentStream(stream, resources, {
    all: (operator, state, scope) => {
      out.push(rewriteOperator(operator, state, scope, ctx));
    },
  });
  return out;
}

function rewriteOperator(
  operator: ContentOperator,
  state: GraphicsState,
  scope: ResourceScope,
  ctx: TransformContext,
): ContentOperator {
  switch (operator.name) {
    case 'CS':
      return rewriteColorspace(operator, state.strokingColorspace, scope, ctx);
    case 'cs':
      return rewriteColorspace(operator, state.nonStrokingColorspace, scope, ctx);
    case 'SC':
    case 'SCN':
      return rewriteColor(operator, state.strokingColorspace, state.strokingColor, scope, ctx);
    case 'sc':
    case 'scn':
      return rewriteColor(operator, state.nonStrokingColorspace, state.nonStrokingColor, scope, ctx);
    case 'RG':
    case 'K':
      return op('G', pdfNumber(grayOf(state.strokingColor, state.strokingColorspace)));
    case 'rg':
    case 'k':
      return op('g', pdfNumber(grayOf(state.nonStrokingColor, state.nonStrokingColorspace)));
    case 'sh':
      convertNamedShading(resourceName(operator), scope, ctx);
      return operator;
    case 'BI': {
      const image = getInlineImage(operator.operands, 0);
      if (!image) throw new PdfParseError('BI without inline image data');
      const gray = convertInlineImageToGray(image, scope, ctx.codec);
      return gray ? op('BI', gray) : operator;
    }
    case 'Do':
      convertNamedXObject(resourceName(operator), scope, ctx);
      return operator;
    default:
      return operator;
  }
}

/**
 * CS/cs. Named Pattern colorspaces keep their operator and get a gray
 * underlying space; every other colorspace becomes DeviceGray.
 */
function rewriteColorspace(
  operator: ContentOperator,
  space: Colorspace,
  scope: ResourceScope,
  ctx: TransformContext,
): ContentOperator {
  if (space.kind !== 'Pattern') return op(operator.name, pdfName('DeviceGray'));

  const name = getName(operator.operands, 0);
  if (name !== null && name !== 'Pattern' && space.underlying && !isGrayColorspace(space.underlying)) {
    ctx.colorspaceWrites.push(() => scope.setColorspace(name, { kind: 'Pattern', underlying: DEVICE_GRAY }));
  }
  return operator;
}

function rewriteColor(
  operator: ContentOperator,
  space: Colorspace,
  color: Color,
  scope: ResourceScope,
  ctx: TransformContext,
): ContentOperator {
  if (!isPatternColor(color)) return op(operator.name, pdfNumber(grayOf(color, space)));

  convertNamedPattern(color.name, scope, ctx);
  const patternName = pdfName(color.name);
  if (!color.underlying) return op(operator.name, patternName);
  const underlyingSpace = space.kind === 'Pattern' ? space.underlying : undefined;
  return op(operator.name, pdfNumber(colorToGray(color.underlying, underlyingSpace)), patternName);
}

function grayOf(color: Color, space: Colorspace): number {
  if (isPatternColor(color)) throw new PdfParseError('Expected a device color, got a pattern');
  return colorToGray(color, space);
}

// ─── Resources ───

function convertNamedPattern(name: string, scope: ResourceScope, ctx: TransformContext): void {
  if (ctx.done.has(scope, 'pattern', name)) return;
  ctx.done.set(scope, 'pattern', name, true);
  const pattern = scope.getPattern(name);
  if (!pattern) throw new UndefinedPatternError(name);
  scope.setPattern(name, patternToGray(pattern, ctx));
}

function convertNamedShading(name: string, scope: ResourceScope, ctx: TransformContext): void {
  if (ctx.done.has(scope, 'shading', name)) return;
  ctx.done.set(scope, 'shading', name, true);
  const shading = scope.getShading(name);
  if (!shading) throw new UndefinedShadingError(name);
  scope.setShading(name, convertShadingToGray(shading));
}

function convertNamedXObject(name: string, scope: ResourceScope, ctx: TransformContext): void {
  if (ctx.done.has(scope, 'xobject', name)) return;
  ctx.done.set(scope, 'xobject', name, true);
  const xobject = scope.getXObject(name);
  if (!xobject) throw new UndefinedXObjectError(name);

  if (xobject.kind === 'image') {
    const gray = convertImageToGray(xobject, ctx.codec, `image /${name}`);
    if (gray) scope.setXObject(name, gray);
    return;
  }

  const formScope = xobject.resources ?? scope;
  const content = ctx.guard.enter(
    xobject.content,
    `form /${name}`,
    () => transformStream(xobject.content, formScope, ctx),
    undefined,
  );
  if (content) scope.setXObject(name, { ...xobject, content });
}

function patternToGray(pattern: Pattern, ctx: TransformContext): Pattern {
  if (pattern.kind === 'shading') {
    return { ...pattern, shading: convertShadingToGray(pattern.shading) };
  }
  // Uncolored tiling patterns take the (already converted) color of the painting operator
  if (!pattern.colored) return pattern;
  const content = ctx.guard.enter(
    pattern.content,
    'tiling pattern',
    () => transformStream(pattern.content, pattern.resources, ctx),
    undefined,
  );
  return content ? { ...pattern, content } : pattern;
}
