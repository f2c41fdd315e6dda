import { describe, it, expect } from 'vitest';
import {
  calGrayColor, cmykColor, grayColor, labColor, patternColor, rgbColor,
} from '../../src/color/color.js';
import {
  DEVICE_CMYK, DEVICE_GRAY, DEVICE_RGB, PATTERN,
  builtinColorspace, colorFromComponents, componentCount, definingColorspace, initialColor, isGrayColorspace,
  type Colorspace, type IndexedSpace, type LabSpace, type SpotSpace,
} from '../../src/color/colorspace.js';
import { cmykToRGB, colorToGray, colorToRGB, rgbToGray } from '../../src/color/convert.js';
import {
  COLOR_TOLERANCE, isColorColored, isColorVisible, isRGBColored, visibleAdditive, visibleSubtractive,
} from '../../src/color/predicates.js';
import { PdfParseError } from '../../src/errors.js';

const indexedRGB: IndexedSpace = {
  kind: 'Indexed',
  base: DEVICE_RGB,
  hival: 1,
  lookup: new Uint8Array([255, 0, 0, 0, 0, 255]),
};

const cyanSpot: SpotSpace = {
  kind: 'Separation',
  colorants: ['Spot'],
  alternate: DEVICE_CMYK,
  tintTransform: { type: 2, domain: [0, 1], c0: [0, 0, 0, 0], c1: [1, 0, 0, 0], n: 1 },
};

const lab: LabSpace = {
  kind: 'Lab',
  whitePoint: [0.9505, 1, 1.089],
  blackPoint: [0, 0, 0],
  range: [-100, 100, -100, 100],
};

describe('colorspaces', () => {
  it('knows the builtin names and their abbreviations', () => {
    expect(builtinColorspace('G')).toBe(DEVICE_GRAY);
    expect(builtinColorspace('DeviceRGB')).toBe(DEVICE_RGB);
    expect(builtinColorspace('CMYK')).toBe(DEVICE_CMYK);
    expect(builtinColorspace('Pattern')).toBe(PATTERN);
    expect(builtinColorspace('CS0')).toBeUndefined();
  });

  it('counts components', () => {
    expect(componentCount(DEVICE_GRAY)).toBe(1);
    expect(componentCount(lab)).toBe(3);
    expect(componentCount(indexedRGB)).toBe(1);
    expect(componentCount(cyanSpot)).toBe(1);
    expect(componentCount({ kind: 'Pattern', underlying: DEVICE_CMYK })).toBe(4);
    expect(componentCount(PATTERN)).toBe(0);
  });

  it('follows bases and alternates to the defining colorspace', () => {
    expect(definingColorspace(indexedRGB)).toBe(DEVICE_RGB);
    expect(definingColorspace(cyanSpot)).toBe(DEVICE_CMYK);
    expect(definingColorspace(PATTERN)).toBeUndefined();
  });

  it('recognizes gray colorspaces through indirection', () => {
    const grayIndexed: Colorspace = { kind: 'Indexed', base: DEVICE_GRAY, hival: 0, lookup: new Uint8Array([0]) };
    expect(isGrayColorspace(grayIndexed)).toBe(true);
    expect(isGrayColorspace({ ...cyanSpot, alternate: DEVICE_GRAY })).toBe(true);
    expect(isGrayColorspace(DEVICE_RGB)).toBe(false);
    expect(isGrayColorspace(PATTERN)).toBe(false);
  });

  it('gives each colorspace its initial color', () => {
    expect(initialColor(DEVICE_GRAY)).toEqual(grayColor(0));
    expect(initialColor(DEVICE_CMYK)).toEqual(cmykColor(0, 0, 0, 1));
    expect(initialColor(PATTERN)).toEqual(patternColor(''));
    expect(initialColor(indexedRGB)).toEqual(rgbColor(1, 0, 0));
    expect(initialColor(cyanSpot)).toEqual(cmykColor(1, 0, 0, 0));
  });
});

describe('colorFromComponents', () => {
  it('clamps device components to 0..1', () => {
    expect(colorFromComponents(DEVICE_RGB, [2, -1, 0.5])).toEqual(rgbColor(1, 0, 0.5));
  });

  it('clamps Lab to its ranges', () => {
    expect(colorFromComponents(lab, [120, -150, 20])).toEqual(labColor(100, -100, 20));
  });

  it('resolves Indexed colors through the lookup table', () => {
    expect(colorFromComponents(indexedRGB, [1])).toEqual(rgbColor(0, 0, 1));
    expect(colorFromComponents(indexedRGB, [7])).toEqual(rgbColor(0, 0, 1));
  });

  it('resolves Separation tints through the tint transform', () => {
    expect(colorFromComponents(cyanSpot, [0.5])).toEqual(cmykColor(0.5, 0, 0, 0));
  });

  it('rejects the wrong component count', () => {
    expect(() => colorFromComponents(DEVICE_RGB, [1, 0])).toThrow(PdfParseError);
  });

  it('rejects components for a Pattern space', () => {
    expect(() => colorFromComponents(PATTERN, [])).toThrow(PdfParseError);
  });
});

describe('conversions', () => {
  it('weights RGB channels for gray', () => {
    expect(rgbToGray(rgbColor(1, 0, 0))).toBeCloseTo(0.3, 10);
    expect(rgbToGray(rgbColor(0, 0, 1))).toBeCloseTo(0.11, 10);
    expect(rgbToGray(rgbColor(1, 1, 1))).toBeCloseTo(1, 10);
  });

  it('converts CMYK through RGB', () => {
    expect(cmykToRGB(1, 0, 0, 0)).toEqual(rgbColor(0, 1, 1));
    expect(cmykToRGB(0, 0, 0, 1)).toEqual(rgbColor(0, 0, 0));
    expect(colorToGray(cmykColor(0, 0, 0, 0))).toBeCloseTo(1, 10);
  });

  it('reads calibrated colors without parameters as device colors', () => {
    expect(colorToRGB(calGrayColor(0.5))).toEqual(rgbColor(0.5, 0.5, 0.5));
  });

  it('maps Lab white to RGB white', () => {
    const white = colorToRGB(labColor(100, 0, 0), lab);
    expect(white.r).toBeCloseTo(1, 3);
    expect(white.g).toBeCloseTo(1, 3);
    expect(white.b).toBeCloseTo(1, 3);
  });
});

describe('predicates', () => {
  it('uses a tolerance of 3.1/255 between channels', () => {
    expect(COLOR_TOLERANCE).toBeCloseTo(3.1 / 255, 12);
    expect(isRGBColored(0.5, 0.5 + 3 / 255, 0.5)).toBe(false);
    expect(isRGBColored(0.5, 0.5 + 4 / 255, 0.5)).toBe(true);
  });

  it('counts a difference of exactly the tolerance as gray and anything above as color', () => {
    expect(isRGBColored(0, COLOR_TOLERANCE, 0)).toBe(false);
    expect(isRGBColored(0, 0, COLOR_TOLERANCE)).toBe(false);
    expect(isRGBColored(0, COLOR_TOLERANCE + 1e-9, 0)).toBe(true);
    expect(isRGBColored(COLOR_TOLERANCE + 1e-9, 0, 0)).toBe(true);
  });

  it('treats gray as never colored', () => {
    expect(isColorColored(grayColor(0.4))).toBe(false);
    expect(isColorColored(calGrayColor(0.4))).toBe(false);
  });

  it('judges CMYK coloredness after conversion to RGB', () => {
    expect(isColorColored(cmykColor(0, 0, 0, 0.5))).toBe(false);
    expect(isColorColored(cmykColor(0.2, 0.2, 0.2, 0))).toBe(false);
    expect(isColorColored(cmykColor(1, 0, 0, 0))).toBe(true);
  });

  it('judges Lab coloredness on a and b', () => {
    expect(isColorColored(labColor(50, 0, 0))).toBe(false);
    expect(isColorColored(labColor(50, 5, 0))).toBe(true);
  });

  it('treats near-white as invisible', () => {
    expect(isColorVisible(grayColor(1))).toBe(false);
    expect(isColorVisible(grayColor(0.99))).toBe(false);
    expect(isColorVisible(grayColor(0.98))).toBe(true);
    expect(isColorVisible(rgbColor(1, 1, 0.5))).toBe(true);
  });

  it('treats CMYK without ink as invisible', () => {
    expect(isColorVisible(cmykColor(0, 0, 0, 0))).toBe(false);
    expect(isColorVisible(cmykColor(0, 0, 0, 0.02))).toBe(true);
  });

  it('judges Lab visibility on lightness', () => {
    expect(isColorVisible(labColor(100, 40, 40))).toBe(false);
    expect(isColorVisible(labColor(50, 0, 0))).toBe(true);
  });

  it('exposes the channel tests', () => {
    expect(visibleAdditive(1, 1, 0.2)).toBe(true);
    expect(visibleSubtractive(0, 0.01)).toBe(false);
  });
});
