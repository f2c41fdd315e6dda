/**
 * Grayscale shadings.
 *
 * A shading's color is a function of position, so its colors cannot be
 * converted one by one. Instead the shading is given a DeviceN colorspace
 * whose colorants are the original components and whose tint transform
 * computes the gray level from them.
 */

import { UnsupportedColorspaceError } from '../errors.js';
import { type SpotSpace, DEVICE_GRAY, componentCount } from '../color/colorspace.js';
import { parsePsProgram } from '../function/postscript.js';
import type { Shading } from '../resources/types.js';

/** gray = 0.3 R + 0.59 G + 0.11 B */
export const RGB_TO_GRAY_PROGRAM = '{ 0.11 mul exch 0.59 mul add exch 0.3 mul add }';

/** 0.3 C + 0.59 M + 0.11 Y + K, capped at 1 */
export const CMYK_TO_GRAY_PROGRAM = '{ exch 0.11 mul add exch 0.59 mul add exch 0.3 mul add dup 1 ge { pop 1 } if }';

export function convertShadingToGray(shading: Shading): Shading {
  const n = componentCount(shading.colorspace);
  switch (n) {
    case 1:
      return shading;
    case 3:
      return { ...shading, colorspace: grayDeviceN(['R', 'G', 'B'], RGB_TO_GRAY_PROGRAM) };
    case 4:
      return { ...shading, colorspace: grayDeviceN(['C', 'M', 'Y', 'K'], CMYK_TO_GRAY_PROGRAM) };
    default:
      throw new UnsupportedColorspaceError(n);
  }
}

function grayDeviceN(colorants: string[], program: string): SpotSpace {
  return {
    kind: 'DeviceN',
    colorants,
    alternate: DEVICE_GRAY,
    tintTransform: {
      type: 4,
      domain: colorants.flatMap(() => [0, 1]),
      range: [0, 1],
      program: parsePsProgram(program),
    },
  };
}
