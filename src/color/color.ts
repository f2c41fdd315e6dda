/**
 * Color values. Components of device colors are in 0..1; Lab keeps its own
 * domain (L in 0..100, a and b in the colorspace's range).
 */

export interface GrayColor {
  readonly kind: 'Gray';
  readonly gray: number;
}

export interface RGBColor {
  readonly kind: 'RGB';
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export interface CMYKColor {
  readonly kind: 'CMYK';
  readonly c: number;
  readonly m: number;
  readonly y: number;
  readonly k: number;
}

export interface LabColor {
  readonly kind: 'Lab';
  readonly l: number;
  readonly a: number;
  readonly b: number;
}

export interface CalRGBColor {
  readonly kind: 'CalRGB';
  readonly a: number;
  readonly b: number;
  readonly c: number;
}

export interface CalGrayColor {
  readonly kind: 'CalGray';
  readonly gray: number;
}

/** Any color that is not a pattern */
export type DeviceColor = GrayColor | RGBColor | CMYKColor | LabColor | CalRGBColor | CalGrayColor;

/**
 * A pattern reference set with scn. An empty name is the initial color of a
 * Pattern colorspace, which paints nothing.
 */
export interface PatternColor {
  readonly kind: 'Pattern';
  readonly name: string;
  /** Color for uncolored tiling patterns, in the underlying colorspace */
  readonly underlying?: DeviceColor;
}

export type Color = DeviceColor | PatternColor;

// ─── Helper constructors ───

export function grayColor(gray: number): GrayColor {
  return { kind: 'Gray', gray };
}

export function rgbColor(r: number, g: number, b: number): RGBColor {
  return { kind: 'RGB', r, g, b };
}

export function cmykColor(c: number, m: number, y: number, k: number): CMYKColor {
  return { kind: 'CMYK', c, m, y, k };
}

export function labColor(l: number, a: number, b: number): LabColor {
  return { kind: 'Lab', l, a, b };
}

export function calRGBColor(a: number, b: number, c: number): CalRGBColor {
  return { kind: 'CalRGB', a, b, c };
}

export function calGrayColor(gray: number): CalGrayColor {
  return { kind: 'CalGray', gray };
}

export function patternColor(name: string, underlying?: DeviceColor): PatternColor {
  return underlying ? { kind: 'Pattern', name, underlying } : { kind: 'Pattern', name };
}

export function isPatternColor(color: Color): color is PatternColor {
  return color.kind === 'Pattern';
}
