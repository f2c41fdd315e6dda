/**
 * Raster helpers: sample unpacking, conversion through a colorspace to 8-bit
 * RGB, RGB to gray, and the colored-pixel test.
 */

import { componentCount, colorFromComponents, type Colorspace } from '../color/colorspace.js';
import { colorToRGB, GRAY_WEIGHTS } from '../color/convert.js';
import { isRGBColored } from '../color/predicates.js';
import { PdfUnsupportedError } from '../errors.js';

/** Decoded, unfiltered image samples, rows padded to whole bytes */
export interface RawImage {
  readonly width: number;
  readonly height: number;
  readonly colorComponents: number;
  readonly bitsPerComponent: number;
  readonly samples: Uint8Array;
}

/** Integer value of the sample starting at `bitOffset` */
export function readSample(samples: Uint8Array, bitsPerComponent: number, bitOffset: number): number {
  switch (bitsPerComponent) {
    case 8:
      return samples[bitOffset >> 3] ?? 0;
    case 16: {
      const i = bitOffset >> 3;
      return ((samples[i] ?? 0) << 8) | (samples[i + 1] ?? 0);
    }
    case 1:
    case 2:
    case 4: {
      const byte = samples[bitOffset >> 3] ?? 0;
      const shift = 8 - bitsPerComponent - (bitOffset & 7);
      return (byte >> shift) & ((1 << bitsPerComponent) - 1);
    }
    default:
      throw new PdfUnsupportedError(`Unsupported bits per component: ${bitsPerComponent}`);
  }
}

/** Default Decode array for samples of `space` */
export function defaultDecode(space: Colorspace, bitsPerComponent: number): number[] {
  switch (space.kind) {
    case 'Indexed':
      return [0, (1 << bitsPerComponent) - 1];
    case 'Lab':
      return [0, 100, ...space.range];
    default:
      return Array.from({ length: componentCount(space) }, () => [0, 1]).flat();
  }
}

/**
 * Convert an image to 8-bit RGB, three bytes per pixel. An image whose codec
 * already produced three components for a colorspace with a different count
 * (a DCT image decoded to RGB) is taken as RGB.
 */
export function imageToRGB(image: RawImage, space: Colorspace, decode?: readonly number[]): Uint8Array {
  const pixels = image.width * image.height;
  const out = new Uint8Array(pixels * 3);
  const n = image.colorComponents;
  const bpc = image.bitsPerComponent;
  const rowBits = Math.ceil((image.width * n * bpc) / 8) * 8;

  if (n === 3 && componentCount(space) !== 3) {
    for (let p = 0; p < pixels; p++) {
      const row = Math.floor(p / image.width);
      const col = p % image.width;
      for (let c = 0; c < 3; c++) {
        out[p * 3 + c] = scaleTo8(readSample(image.samples, bpc, row * rowBits + (col * 3 + c) * bpc), bpc);
      }
    }
    return out;
  }

  if (n !== componentCount(space)) {
    throw new PdfUnsupportedError(`Image has ${n} components but its colorspace has ${componentCount(space)}`);
  }

  const maxVal = Math.pow(2, bpc) - 1;
  const ranges = decode && decode.length >= 2 * n ? decode : defaultDecode(space, bpc);
  const cache = new Map<string, readonly [number, number, number]>();
  const raw = new Array<number>(n);

  for (let p = 0; p < pixels; p++) {
    const row = Math.floor(p / image.width);
    const col = p % image.width;
    for (let c = 0; c < n; c++) {
      raw[c] = readSample(image.samples, bpc, row * rowBits + (col * n + c) * bpc);
    }

    const key = raw.join(',');
    let rgb = cache.get(key);
    if (!rgb) {
      const components = raw.map((s, c) => ranges[2 * c] + (s * (ranges[2 * c + 1] - ranges[2 * c])) / maxVal);
      const color = colorToRGB(colorFromComponents(space, components), space);
      rgb = [to8(color.r), to8(color.g), to8(color.b)];
      if (cache.size < 4096) cache.set(key, rgb);
    }
    out[p * 3] = rgb[0];
    out[p * 3 + 1] = rgb[1];
    out[p * 3 + 2] = rgb[2];
  }
  return out;
}

/** 8-bit RGB to an 8-bit single-component gray image */
export function rgbToGrayImage(rgb: Uint8Array, width: number, height: number): RawImage {
  const pixels = width * height;
  const samples = new Uint8Array(pixels);
  for (let p = 0; p < pixels; p++) {
    const gray = GRAY_WEIGHTS.r * rgb[p * 3] + GRAY_WEIGHTS.g * rgb[p * 3 + 1] + GRAY_WEIGHTS.b * rgb[p * 3 + 2];
    samples[p] = Math.min(255, Math.round(gray));
  }
  return { width, height, colorComponents: 1, bitsPerComponent: 8, samples };
}

/** True when any pixel of an 8-bit RGB buffer is colored */
export function isRGBImageColored(rgb: Uint8Array): boolean {
  for (let i = 0; i + 2 < rgb.length; i += 3) {
    if (isRGBColored(rgb[i] / 255, rgb[i + 1] / 255, rgb[i + 2] / 255)) return true;
  }
  return false;
}

function scaleTo8(sample: number, bpc: number): number {
  if (bpc === 8) return sample;
  return Math.round((sample * 255) / (Math.pow(2, bpc) - 1));
}

function to8(x: number): number {
  return Math.round(Math.min(Math.max(x, 0), 1) * 255);
}
