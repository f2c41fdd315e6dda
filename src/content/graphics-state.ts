/**
 * The part of the PDF graphics state that colors depend on.
 */

import type { Color } from '../color/color.js';
import { type Colorspace, DEVICE_GRAY } from '../color/colorspace.js';
import { grayColor } from '../color/color.js';

export interface GraphicsState {
  readonly strokingColorspace: Colorspace;
  readonly strokingColor: Color;
  readonly nonStrokingColorspace: Colorspace;
  readonly nonStrokingColor: Color;
  /** Tr operand: 0 fill, 1 stroke, 2 both, 3 invisible, 4-7 the same plus clipping */
  readonly textRenderMode: number;
}

/** DeviceGray black for both roles, filled text */
export function defaultGraphicsState(): GraphicsState {
  return {
    strokingColorspace: DEVICE_GRAY,
    strokingColor: grayColor(0),
    nonStrokingColorspace: DEVICE_GRAY,
    nonStrokingColor: grayColor(0),
    textRenderMode: 0,
  };
}
