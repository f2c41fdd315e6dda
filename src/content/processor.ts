/**
 * Content Stream Processor
 *
 * Walks a parsed content stream, keeping the color graphics state, and hands
 * every operator to the registered handlers. The state is updated from the
 * operator's own effect before its handlers run. Nested content (forms,
 * tiling patterns) is never entered here; handlers do that themselves.
 */

import type { Operand } from '../parser/types.js';
import { PdfParseError, UndefinedColorspaceError } from '../errors.js';
import { getLogger } from '../logger.js';
import { type Color, cmykColor, grayColor, patternColor, rgbColor } from '../color/color.js';
import {
  type Colorspace,
  DEVICE_CMYK, DEVICE_GRAY, DEVICE_RGB,
  builtinColorspace, colorFromComponents, initialColor,
} from '../color/colorspace.js';
import type { ResourceScope } from '../resources/types.js';
import { type GraphicsState, defaultGraphicsState } from './graphics-state.js';
import { type ContentOperator, type ContentStream, getName, getNum, getNums } from './operators.js';

export type OperatorHandler = (
  op: ContentOperator,
  state: GraphicsState,
  resources: ResourceScope,
) => void;

export interface HandlerSet {
  /** Runs for every operator, before the operator's own handler */
  readonly all?: OperatorHandler;
  /** Handlers keyed by operator name */
  readonly operators?: Readonly<Record<string, OperatorHandler>>;
}

/**
 * Process `stream` against `resources`. The first error thrown by a state
 * update or a handler stops processing and propagates.
 *
 * @returns the graphics state after the last operator
 */
export function processContentStream(
  stream: ContentStream,
  resources: ResourceScope,
  handlers: HandlerSet,
  initialState: GraphicsState = defaultGraphicsState(),
): GraphicsState {
  const stateStack: GraphicsState[] = [];
  let state = initialState;

  for (const op of stream) {
    switch (op.name) {
      case 'q':
        stateStack.push(state);
        break;
      case 'Q': {
        const restored = stateStack.pop();
        if (restored) {
          state = restored;
        } else {
          getLogger().warn('Q without matching q ignored');
        }
        break;
      }
      default:
        state = applyColorOperator(state, op, resources);
    }

    handlers.all?.(op, state, resources);
    const handler = handlers.operators && Object.hasOwn(handlers.operators, op.name)
      ? handlers.operators[op.name]
      : undefined;
    handler?.(op, state, resources);
  }

  return state;
}

/** The graphics state after `op`; operators without a color effect return `state` itself. */
export function applyColorOperator(
  state: GraphicsState,
  op: ContentOperator,
  resources: ResourceScope,
): GraphicsState {
  switch (op.name) {
    case 'CS': {
      const space = resolveColorspace(op, resources);
      return { ...state, strokingColorspace: space, strokingColor: initialColor(space) };
    }
    case 'cs': {
      const space = resolveColorspace(op, resources);
      return { ...state, nonStrokingColorspace: space, nonStrokingColor: initialColor(space) };
    }
    case 'SC':
    case 'SCN':
      return { ...state, strokingColor: colorFromOperands(state.strokingColorspace, op) };
    case 'sc':
    case 'scn':
      return { ...state, nonStrokingColor: colorFromOperands(state.nonStrokingColorspace, op) };
    case 'G':
      return { ...state, strokingColorspace: DEVICE_GRAY, strokingColor: grayColor(numbers(op, 1)[0]) };
    case 'g':
      return { ...state, nonStrokingColorspace: DEVICE_GRAY, nonStrokingColor: grayColor(numbers(op, 1)[0]) };
    case 'RG': {
      const [r, g, b] = numbers(op, 3);
      return { ...state, strokingColorspace: DEVICE_RGB, strokingColor: rgbColor(r, g, b) };
    }
    case 'rg': {
      const [r, g, b] = numbers(op, 3);
      return { ...state, nonStrokingColorspace: DEVICE_RGB, nonStrokingColor: rgbColor(r, g, b) };
    }
    case 'K': {
      const [c, m, y, k] = numbers(op, 4);
      return { ...state, strokingColorspace: DEVICE_CMYK, strokingColor: cmykColor(c, m, y, k) };
    }
    case 'k': {
      const [c, m, y, k] = numbers(op, 4);
      return { ...state, nonStrokingColorspace: DEVICE_CMYK, nonStrokingColor: cmykColor(c, m, y, k) };
    }
    case 'Tr': {
      const mode = getNum(op.operands, 0);
      if (mode === null) throw new PdfParseError('Tr expects a number');
      return { ...state, textRenderMode: mode };
    }
    default:
      return state;
  }
}

function resolveColorspace(op: ContentOperator, resources: ResourceScope): Colorspace {
  const name = getName(op.operands, 0);
  if (name === null) throw new PdfParseError(`${op.name} expects a colorspace name`);
  const space = builtinColorspace(name) ?? resources.getColorspace(name);
  if (!space) throw new UndefinedColorspaceError(name);
  return space;
}

function colorFromOperands(space: Colorspace, op: ContentOperator): Color {
  if (space.kind === 'Pattern') {
    const last = op.operands.length - 1;
    const name = getName(op.operands, last);
    if (name === null) throw new PdfParseError(`${op.name} in a Pattern colorspace expects a pattern name`);
    const components = componentsOf(op, op.operands.slice(0, last));
    if (components.length === 0) return patternColor(name);
    if (!space.underlying) {
      throw new PdfParseError(`${op.name} gives color components for a pattern without an underlying colorspace`);
    }
    return patternColor(name, colorFromComponents(space.underlying, components));
  }
  return colorFromComponents(space, componentsOf(op, op.operands));
}

function componentsOf(op: ContentOperator, operands: readonly Operand[]): number[] {
  const values = getNums(operands);
  if (values === null) throw new PdfParseError(`${op.name} expects numeric color components`);
  return values;
}

function numbers(op: ContentOperator, count: number): number[] {
  const values = getNums(op.operands);
  if (values === null || values.length !== count) {
    throw new PdfParseError(`${op.name} expects ${count} numbers`);
  }
  return values;
}
