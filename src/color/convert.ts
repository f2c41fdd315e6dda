/**
 * Color conversions to RGB and gray.
 */

import { UnknownColorTypeError } from '../errors.js';
import { type DeviceColor, type RGBColor, rgbColor } from './color.js';
import {
  type CalGraySpace, type CalRGBSpace, type Colorspace, type LabSpace,
  D65_WHITE_POINT, definingColorspace,
} from './colorspace.js';

/** Luma weights shared by every gray conversion */
export const GRAY_WEIGHTS = { r: 0.3, g: 0.59, b: 0.11 } as const;

export function rgbToGray(color: RGBColor): number {
  return GRAY_WEIGHTS.r * color.r + GRAY_WEIGHTS.g * color.g + GRAY_WEIGHTS.b * color.b;
}

export function cmykToRGB(c: number, m: number, y: number, k: number): RGBColor {
  return rgbColor((1 - c) * (1 - k), (1 - m) * (1 - k), (1 - y) * (1 - k));
}

/**
 * Convert a color to RGB. Calibrated and Lab colors use the parameters of
 * `space` (or of the space it resolves to) when it matches the color's family;
 * without one, CalGray and CalRGB are read as their device counterparts and
 * Lab uses a D65 white point.
 */
export function colorToRGB(color: DeviceColor, space?: Colorspace): RGBColor {
  const params = space ? definingColorspace(space) : undefined;

  switch (color.kind) {
    case 'Gray':
      return rgbColor(color.gray, color.gray, color.gray);
    case 'RGB':
      return color;
    case 'CMYK':
      return cmykToRGB(color.c, color.m, color.y, color.k);
    case 'CalGray':
      return params?.kind === 'CalGray'
        ? calGrayToRGB(color.gray, params)
        : rgbColor(color.gray, color.gray, color.gray);
    case 'CalRGB':
      return params?.kind === 'CalRGB'
        ? calRGBToRGB(color.a, color.b, color.c, params)
        : rgbColor(color.a, color.b, color.c);
    case 'Lab':
      return labToRGB(color.l, color.a, color.b, params?.kind === 'Lab' ? params : undefined);
    default:
      throw new UnknownColorTypeError(color);
  }
}

export function colorToGray(color: DeviceColor, space?: Colorspace): number {
  return rgbToGray(colorToRGB(color, space));
}

// ─── CIE-based conversions ───

function calGrayToRGB(a: number, space: CalGraySpace): RGBColor {
  const ag = Math.pow(a, space.gamma);
  const [xw, yw, zw] = space.whitePoint;
  return xyzToRGB(xw * ag, yw * ag, zw * ag);
}

function calRGBToRGB(a: number, b: number, c: number, space: CalRGBSpace): RGBColor {
  const ag = Math.pow(a, space.gamma[0]);
  const bg = Math.pow(b, space.gamma[1]);
  const cg = Math.pow(c, space.gamma[2]);
  const m = space.matrix;
  return xyzToRGB(
    m[0] * ag + m[3] * bg + m[6] * cg,
    m[1] * ag + m[4] * bg + m[7] * cg,
    m[2] * ag + m[5] * bg + m[8] * cg,
  );
}

function labToRGB(l: number, a: number, b: number, space?: LabSpace): RGBColor {
  const [xw, yw, zw] = space?.whitePoint ?? D65_WHITE_POINT;
  const lp = (l + 16) / 116;
  const x = xw * labInverse(lp + a / 500);
  const y = yw * labInverse(lp);
  const z = zw * labInverse(lp - b / 200);
  return xyzToRGB(x, y, z);
}

function labInverse(x: number): number {
  return x >= 6 / 29 ? x * x * x : (108 / 841) * (x - 4 / 29);
}

function xyzToRGB(x: number, y: number, z: number): RGBColor {
  const r = 3.240479 * x - 1.53715 * y - 0.498535 * z;
  const g = -0.969256 * x + 1.875992 * y + 0.041556 * z;
  const b = 0.055648 * x - 0.204043 * y + 1.057311 * z;
  return rgbColor(clamp01(r), clamp01(g), clamp01(b));
}

function clamp01(x: number): number {
  return Math.min(Math.max(x, 0), 1);
}
