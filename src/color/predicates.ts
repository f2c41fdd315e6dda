/**
 * Coloredness and visibility predicates.
 *
 * Coloredness asks whether a color has hue; visibility asks whether it puts
 * ink on the page. Lab is judged on a/b for the first and on L for the second.
 */

import { UnknownColorTypeError } from '../errors.js';
import type { DeviceColor } from './color.js';
import { cmykToRGB } from './convert.js';

/** Smallest channel difference (on a 0..1 scale) that counts as visible */
export const COLOR_TOLERANCE = 3.1 / 255;

/** A normalized RGB triplet is colored when any two channels differ by more than the tolerance */
export function isRGBColored(r: number, g: number, b: number): boolean {
  return (
    Math.abs(r - g) > COLOR_TOLERANCE ||
    Math.abs(r - b) > COLOR_TOLERANCE ||
    Math.abs(g - b) > COLOR_TOLERANCE
  );
}

export function isColorColored(color: DeviceColor): boolean {
  switch (color.kind) {
    case 'Gray':
    case 'CalGray':
      return false;
    case 'RGB':
      return isRGBColored(color.r, color.g, color.b);
    case 'CalRGB':
      return isRGBColored(color.a, color.b, color.c);
    case 'CMYK': {
      const rgb = cmykToRGB(color.c, color.m, color.y, color.k);
      return isRGBColored(rgb.r, rgb.g, rgb.b);
    }
    case 'Lab':
      return Math.abs(color.a) > COLOR_TOLERANCE || Math.abs(color.b) > COLOR_TOLERANCE;
    default:
      throw new UnknownColorTypeError(color);
  }
}

/** Additive channels put ink down when any channel is darker than near-white */
export function visibleAdditive(...channels: number[]): boolean {
  return channels.some((x) => Math.abs(x) < 1 - COLOR_TOLERANCE);
}

/** Subtractive channels put ink down when any channel carries more than a trace */
export function visibleSubtractive(...channels: number[]): boolean {
  return channels.some((x) => Math.abs(x) > COLOR_TOLERANCE);
}

export function isColorVisible(color: DeviceColor): boolean {
  switch (color.kind) {
    case 'Gray':
    case 'CalGray':
      return visibleAdditive(color.gray);
    case 'RGB':
      return visibleAdditive(color.r, color.g, color.b);
    case 'CalRGB':
      return visibleAdditive(color.a, color.b, color.c);
    case 'Lab':
      // L runs 0..100
      return visibleAdditive(color.l / 100);
    case 'CMYK':
      return visibleSubtractive(color.c, color.m, color.y, color.k);
    default:
      throw new UnknownColorTypeError(color);
  }
}
