/**
 * Colorspaces and the colors they produce.
 *
 * Colors held in the graphics state are always resolved to the colorspace
 * that finally defines them: an Indexed color becomes its base color through
 * the lookup table, a Separation/DeviceN tint becomes its alternate color
 * through the tint transform.
 */

import type { PdfDict } from '../parser/types.js';
import { PdfParseError, UnknownColorTypeError } from '../errors.js';
import { evaluateFunction, type PdfFunction } from '../function/pdf-function.js';
import {
  type Color, type DeviceColor,
  calGrayColor, calRGBColor, cmykColor, grayColor, labColor, patternColor, rgbColor,
} from './color.js';

export type Tristimulus = readonly [number, number, number];

export interface DeviceGraySpace { readonly kind: 'DeviceGray' }
export interface DeviceRGBSpace { readonly kind: 'DeviceRGB' }
export interface DeviceCMYKSpace { readonly kind: 'DeviceCMYK' }

export interface CalGraySpace {
  readonly kind: 'CalGray';
  readonly whitePoint: Tristimulus;
  readonly blackPoint: Tristimulus;
  readonly gamma: number;
}

export interface CalRGBSpace {
  readonly kind: 'CalRGB';
  readonly whitePoint: Tristimulus;
  readonly blackPoint: Tristimulus;
  readonly gamma: Tristimulus;
  /** XA YA ZA XB YB ZB XC YC ZC */
  readonly matrix: readonly number[];
}

export interface LabSpace {
  readonly kind: 'Lab';
  readonly whitePoint: Tristimulus;
  readonly blackPoint: Tristimulus;
  /** amin amax bmin bmax */
  readonly range: readonly [number, number, number, number];
}

export interface IndexedSpace {
  readonly kind: 'Indexed';
  readonly base: Colorspace;
  readonly hival: number;
  /** (hival + 1) * components(base) bytes */
  readonly lookup: Uint8Array;
}

export interface PatternSpace {
  readonly kind: 'Pattern';
  /** Present for uncolored tiling patterns */
  readonly underlying?: Colorspace;
}

/** Separation (one colorant) or DeviceN */
export interface SpotSpace {
  readonly kind: 'Separation' | 'DeviceN';
  readonly colorants: readonly string[];
  readonly alternate: Colorspace;
  readonly tintTransform: PdfFunction;
  readonly attributes?: PdfDict;
}

export type Colorspace =
  | DeviceGraySpace
  | DeviceRGBSpace
  | DeviceCMYKSpace
  | CalGraySpace
  | CalRGBSpace
  | LabSpace
  | IndexedSpace
  | PatternSpace
  | SpotSpace;

/** The colorspaces a DeviceColor can belong to */
export type ColorDefiningSpace =
  | DeviceGraySpace | DeviceRGBSpace | DeviceCMYKSpace | CalGraySpace | CalRGBSpace | LabSpace;

export const DEVICE_GRAY: DeviceGraySpace = { kind: 'DeviceGray' };
export const DEVICE_RGB: DeviceRGBSpace = { kind: 'DeviceRGB' };
export const DEVICE_CMYK: DeviceCMYKSpace = { kind: 'DeviceCMYK' };
export const PATTERN: PatternSpace = { kind: 'Pattern' };

export const D65_WHITE_POINT: Tristimulus = [0.9505, 1, 1.089];

/** Colorspace names usable with CS/cs without a resource entry */
export function builtinColorspace(name: string): Colorspace | undefined {
  switch (name) {
    case 'DeviceGray': case 'G': return DEVICE_GRAY;
    case 'DeviceRGB': case 'RGB': return DEVICE_RGB;
    case 'DeviceCMYK': case 'CMYK': return DEVICE_CMYK;
    case 'Pattern': return PATTERN;
    default: return undefined;
  }
}

export function componentCount(space: Colorspace): number {
  switch (space.kind) {
    case 'DeviceGray':
    case 'CalGray':
    case 'Indexed':
      return 1;
    case 'DeviceRGB':
    case 'CalRGB':
    case 'Lab':
      return 3;
    case 'DeviceCMYK':
      return 4;
    case 'Pattern':
      return space.underlying ? componentCount(space.underlying) : 0;
    case 'Separation':
    case 'DeviceN':
      return space.colorants.length;
    default:
      throw new UnknownColorTypeError(space);
  }
}

/**
 * The colorspace that defines the colors of `space`, following Indexed bases,
 * Separation/DeviceN alternates and Pattern underlying spaces.
 */
export function definingColorspace(space: Colorspace): ColorDefiningSpace | undefined {
  switch (space.kind) {
    case 'Indexed':
      return definingColorspace(space.base);
    case 'Separation':
    case 'DeviceN':
      return definingColorspace(space.alternate);
    case 'Pattern':
      return space.underlying ? definingColorspace(space.underlying) : undefined;
    default:
      return space;
  }
}

/** True for colorspaces whose colors can only be shades of gray */
export function isGrayColorspace(space: Colorspace): boolean {
  const defining = definingColorspace(space);
  return defining?.kind === 'DeviceGray' || defining?.kind === 'CalGray';
}

/** The color a colorspace starts with when selected by CS/cs */
export function initialColor(space: Colorspace): Color {
  switch (space.kind) {
    case 'DeviceGray':
      return grayColor(0);
    case 'CalGray':
      return calGrayColor(0);
    case 'DeviceRGB':
      return rgbColor(0, 0, 0);
    case 'CalRGB':
      return calRGBColor(0, 0, 0);
    case 'DeviceCMYK':
      return cmykColor(0, 0, 0, 1);
    case 'Lab':
      return colorFromComponents(space, [0, 0, 0]);
    case 'Indexed':
      return colorFromComponents(space, [0]);
    case 'Separation':
    case 'DeviceN':
      return colorFromComponents(space, space.colorants.map(() => 1));
    case 'Pattern':
      return patternColor('');
    default:
      throw new UnknownColorTypeError(space);
  }
}

/**
 * Build the color for SC/sc operands in `space`. Out-of-range components are
 * clipped as a PDF consumer does.
 */
export function colorFromComponents(space: Colorspace, components: readonly number[]): DeviceColor {
  const expected = componentCount(space);
  if (space.kind === 'Pattern') {
    throw new PdfParseError('Pattern colors need a pattern name');
  }
  if (components.length !== expected) {
    throw new PdfParseError(`${space.kind} expects ${expected} color components, got ${components.length}`);
  }
  const c = components.map(clamp01);

  switch (space.kind) {
    case 'DeviceGray':
      return grayColor(c[0]);
    case 'CalGray':
      return calGrayColor(c[0]);
    case 'DeviceRGB':
      return rgbColor(c[0], c[1], c[2]);
    case 'CalRGB':
      return calRGBColor(c[0], c[1], c[2]);
    case 'DeviceCMYK':
      return cmykColor(c[0], c[1], c[2], c[3]);
    case 'Lab': {
      const [amin, amax, bmin, bmax] = space.range;
      return labColor(
        clamp(components[0], 0, 100),
        clamp(components[1], amin, amax),
        clamp(components[2], bmin, bmax),
      );
    }
    case 'Indexed':
      return indexedColor(space, components[0]);
    case 'Separation':
    case 'DeviceN': {
      const alt = evaluateFunction(space.tintTransform, c);
      const altCount = componentCount(space.alternate);
      return colorFromComponents(space.alternate, alt.slice(0, altCount));
    }
    default:
      throw new UnknownColorTypeError(space);
  }
}

function indexedColor(space: IndexedSpace, index: number): DeviceColor {
  const i = clamp(Math.round(index), 0, space.hival);
  const n = componentCount(space.base);
  const bytes = Array.from(space.lookup.subarray(i * n, i * n + n));
  while (bytes.length < n) bytes.push(0);

  // Lookup bytes are scaled to the base colorspace's component range
  if (space.base.kind === 'Lab') {
    const [amin, amax, bmin, bmax] = space.base.range;
    return colorFromComponents(space.base, [
      (bytes[0] / 255) * 100,
      amin + (bytes[1] / 255) * (amax - amin),
      bmin + (bytes[2] / 255) * (bmax - bmin),
    ]);
  }
  return colorFromComponents(space.base, bytes.map((b) => b / 255));
}

function clamp01(x: number): number {
  return clamp(x, 0, 1);
}

function clamp(x: number, lo: number, hi: number): number {
  return Math.min(Math.max(x, lo), hi);
}
