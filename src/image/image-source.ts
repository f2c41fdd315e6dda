/**
 * Uniform view of inline images and image XObjects for the detectors and
 * the transformer.
 */

import type { PdfInlineImage, PdfObject } from '../parser/types.js';
import { dictGet, dictGetBool, dictGetNumber, dictGetNumbers, isName } from '../parser/types.js';
import { PdfParseError, UndefinedColorspaceError } from '../errors.js';
import { type Colorspace, DEVICE_GRAY, builtinColorspace, componentCount } from '../color/colorspace.js';
import { getFilters, normalizeFilterName } from '../stream/decoder.js';
import { parseColorspace } from '../resources/colorspace-object.js';
import { type ImageXObject, type ResourceScope, imageFilter } from '../resources/types.js';
import type { EncodedImage, ImageCodec } from './codec.js';
import { imageToRGB } from './raster.js';

export interface ImageSource {
  readonly encoded: EncodedImage;
  readonly colorspace: Colorspace;
  readonly decode?: readonly number[];
  /** The image's own encoding: the last filter of the chain, unabbreviated */
  readonly filter?: string;
  readonly imageMask: boolean;
}

export function inlineImageSource(image: PdfInlineImage, resources: ResourceScope): ImageSource {
  const dict = image.dict;
  const imageMask = (dictGetBool(dict, 'IM') ?? dictGetBool(dict, 'ImageMask')) ?? false;
  const csObj = dictGet(dict, 'CS') ?? dictGet(dict, 'ColorSpace');
  const colorspace = imageMask || !csObj ? DEVICE_GRAY : inlineColorspace(csObj, resources);
  const bitsPerComponent = imageMask ? 1 : ((dictGetNumber(dict, 'BPC') ?? dictGetNumber(dict, 'BitsPerComponent')) ?? 8);
  const filters = getFilters(dict, undefined, true);
  const decode = dictGetNumbers(dict, 'D') ?? dictGetNumbers(dict, 'Decode');

  return {
    encoded: {
      width: (dictGetNumber(dict, 'W') ?? dictGetNumber(dict, 'Width')) ?? 0,
      height: (dictGetNumber(dict, 'H') ?? dictGetNumber(dict, 'Height')) ?? 0,
      bitsPerComponent,
      colorComponents: componentCount(colorspace),
      filters,
      data: image.data,
    },
    colorspace,
    imageMask,
    ...(decode ? { decode } : {}),
    ...(filters.length > 0 ? { filter: filters[filters.length - 1].name } : {}),
  };
}

export function xobjectImageSource(image: ImageXObject): ImageSource {
  const last = image.filters.length - 1;
  const filter = imageFilter(image);
  return {
    encoded: {
      width: image.width,
      height: image.height,
      bitsPerComponent: image.bitsPerComponent,
      colorComponents: componentCount(image.colorspace),
      filters: image.filters.map((name, i) => (
        i === last && image.decodeParms ? { name, parms: image.decodeParms } : { name }
      )),
      data: image.data,
    },
    colorspace: image.colorspace,
    imageMask: image.imageMask ?? false,
    ...(image.decode ? { decode: image.decode } : {}),
    ...(filter ? { filter: normalizeFilterName(filter) } : {}),
  };
}

/** Decode an image to 8-bit RGB, three bytes per pixel */
export function decodeToRGB(source: ImageSource, codec: ImageCodec): { rgb: Uint8Array; width: number; height: number } {
  const raw = codec.decode(source.encoded);
  return { rgb: imageToRGB(raw, source.colorspace, source.decode), width: raw.width, height: raw.height };
}

function inlineColorspace(obj: PdfObject, resources: ResourceScope): Colorspace {
  if (isName(obj)) {
    const named = builtinColorspace(obj.value) ?? resources.getColorspace(obj.value);
    if (!named) throw new UndefinedColorspaceError(obj.value);
    return named;
  }
  if (obj.kind !== 'array') throw new PdfParseError('Inline image colorspace must be a name or an array');
  return parseColorspace(obj);
}
