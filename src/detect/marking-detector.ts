/**
 * Marking Detector
 *
 * Decides whether a content stream leaves any visible mark: a path painted,
 * text shown or an image drawn in a color that puts ink on the page.
 * Unlike the color detector, black and gray count; white does not.
 */

import { isString } from '../parser/types.js';
import { UndefinedPatternError, UndefinedXObjectError } from '../errors.js';
import { type Color, isPatternColor } from '../color/color.js';
import { isColorVisible } from '../color/predicates.js';
import type { Pattern, ResourceScope } from '../resources/types.js';
import type { ContentOperator, ContentStream } from '../content/operators.js';
import { getArr, getStr, resourceName } from '../content/operators.js';
import type { GraphicsState } from '../content/graphics-state.js';
import { processContentStream } from '../content/processor.js';
import { type DetectContext, type DetectOptions, createDetectContext, memoized } from './context.js';

export interface OperatorMarking {
  /** The operator can put marks on the page */
  readonly marks: boolean;
  /** It paints with the stroking color */
  readonly usesStroke: boolean;
  /** It paints with the non-stroking color */
  readonly usesFill: boolean;
}

const STROKE: OperatorMarking = { marks: true, usesStroke: true, usesFill: false };
const FILL: OperatorMarking = { marks: true, usesStroke: false, usesFill: true };
const BOTH: OperatorMarking = { marks: true, usesStroke: true, usesFill: true };
/** Marks whatever the current colors are */
const ALWAYS: OperatorMarking = { marks: true, usesStroke: false, usesFill: false };

/**
 * Operators that can mark the page. Every other operator (path construction,
 * text and graphics state, color setting, marked content) never marks;
 * `Do` is judged by the XObject it draws.
 */
export const MARKING_OPERATORS: Readonly<Record<string, OperatorMarking>> = {
  b: BOTH, B: BOTH, 'b*': BOTH, 'B*': BOTH,
  f: FILL, F: FILL, 'f*': FILL,
  s: STROKE, S: STROKE,
  sh: BOTH,
  Tj: BOTH, TJ: BOTH, "'": BOTH, '"': BOTH,
  BI: ALWAYS, ID: ALWAYS, EI: ALWAYS,
};

const TEXT_OPERATORS = new Set(['Tj', 'TJ', "'", '"']);

/** Text render modes that paint nothing: invisible, and clip only */
const INVISIBLE_TEXT_MODES = new Set([3, 7]);

export function operatorMarking(name: string): OperatorMarking | undefined {
  return Object.hasOwn(MARKING_OPERATORS, name) ? MARKING_OPERATORS[name] : undefined;
}

/** True if `stream`, drawn with `resources`, leaves a visible mark */
export function isMarked(stream: ContentStream, resources: ResourceScope, options?: DetectOptions): boolean {
  return streamMarked(stream, resources, createDetectContext(options));
}

/** True when no glyph would be shown: nothing is left after dropping control bytes and spaces */
export function isTextEmpty(op: ContentOperator): boolean {
  switch (op.name) {
    case 'Tj':
    case "'":
      return stringEmpty(getStr(op.operands, 0));
    case '"':
      return stringEmpty(getStr(op.operands, 2));
    case 'TJ': {
      const items = getArr(op.operands, 0) ?? [];
      return items.every((item) => !isString(item) || stringEmpty(item.value));
    }
    default:
      return false;
  }
}

// ─── Traversal ───

function streamMarked(stream: ContentStream, resources: ResourceScope, ctx: DetectContext): boolean {
  let marked = false;

  processContentStream(stream, resources, {
    all: (op, state, scope) => {
      if (marked) return;
      if (op.name === 'Do') {
        marked = xobjectMarked(resourceName(op), scope, ctx);
        return;
      }
      marked = operatorMarks(op, state, scope, ctx);
    },
  });

  return marked;
}

function operatorMarks(op: ContentOperator, state: GraphicsState, scope: ResourceScope, ctx: DetectContext): boolean {
  const marking = operatorMarking(op.name);
  if (!marking?.marks) return false;

  if (TEXT_OPERATORS.has(op.name)) {
    if (INVISIBLE_TEXT_MODES.has(state.textRenderMode) || isTextEmpty(op)) return false;
  }
  if (!marking.usesStroke && !marking.usesFill) return true;

  return (marking.usesStroke && colorVisible(op, state.strokingColor, scope, ctx))
    || (marking.usesFill && colorVisible(op, state.nonStrokingColor, scope, ctx));
}

function xobjectMarked(name: string, scope: ResourceScope, ctx: DetectContext): boolean {
  return memoized(ctx, scope, 'xobject', name, () => {
    const xobject = scope.getXObject(name);
    if (!xobject) throw new UndefinedXObjectError(name);
    // Images are not decoded
    if (xobject.kind === 'image') return true;
    const formScope = xobject.resources ?? scope;
    return ctx.guard.enter(xobject.content, `form /${name}`, () => streamMarked(xobject.content, formScope, ctx), false);
  });
}

function colorVisible(op: ContentOperator, color: Color, scope: ResourceScope, ctx: DetectContext): boolean {
  if (!isPatternColor(color)) return isColorVisible(color);
  if (color.underlying) return isColorVisible(color.underlying);
  // Pattern colorspace selected but no pattern set yet
  if (color.name === '') return false;

  return memoized(ctx, scope, 'pattern', color.name, () => {
    const pattern = scope.getPattern(color.name);
    if (!pattern) throw new UndefinedPatternError(color.name);
    return patternMarked(pattern, op, ctx);
  });
}

function patternMarked(pattern: Pattern, op: ContentOperator, ctx: DetectContext): boolean {
  if (pattern.kind === 'shading') return true;
  return ctx.guard.enter(
    pattern.content,
    `tiling pattern painted by ${op.name}`,
    () => streamMarked(pattern.content, pattern.resources, ctx),
    false,
  );
}

function stringEmpty(bytes: Uint8Array | null): boolean {
  if (bytes === null) return true;
  return bytes.every((b) => b <= 32 || b === 127);
}
