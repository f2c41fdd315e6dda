/**
 * Grayscale images: decode, convert every pixel to gray, re-encode with the
 * image's own filter.
 */

import type { PdfInlineImage, PdfObject } from '../parser/types.js';
import { dictWithout, pdfDict, pdfInlineImage, pdfName, pdfNumber } from '../parser/types.js';
import { UnsupportedEncodingParametersError } from '../errors.js';
import { getLogger } from '../logger.js';
import { DEVICE_GRAY, componentCount } from '../color/colorspace.js';
import type { EncodedImageData, ImageCodec } from '../image/codec.js';
import { type ImageSource, decodeToRGB, inlineImageSource, xobjectImageSource } from '../image/image-source.js';
import { type RawImage, rgbToGrayImage } from '../image/raster.js';
import type { ImageXObject, ResourceScope } from '../resources/types.js';

/** Why an image is left as it is, or undefined when it is converted */
export function grayImageSkipReason(source: ImageSource): string | undefined {
  if (componentCount(source.colorspace) === 1) return `single-component ${source.colorspace.kind} colorspace`;
  switch (source.filter) {
    case 'JPXDecode':
      return 'JPXDecode data is not decoded';
    case 'CCITTFaxDecode':
    case 'JBIG2Decode':
      return `${source.filter} images are bilevel`;
    default:
      return undefined;
  }
}

/** The gray version of an image XObject, or undefined when it is kept unchanged */
export function convertImageToGray(image: ImageXObject, codec: ImageCodec, label = 'image'): ImageXObject | undefined {
  const source = xobjectImageSource(image);
  // Soft-masked RunLength images are left alone
  const reason = grayImageSkipReason(source)
    ?? (source.filter === 'RunLengthDecode' && image.softMask ? 'RunLengthDecode image with a soft mask' : undefined);
  if (reason) {
    getLogger().debug(`Skipping ${label}: ${reason}`);
    return undefined;
  }

  const { raw, encoded } = encodeGray(source, codec, label);
  const { decode: _decode, decodeParms: _decodeParms, ...rest } = image;
  return {
    ...rest,
    width: raw.width,
    height: raw.height,
    colorspace: DEVICE_GRAY,
    bitsPerComponent: 8,
    filters: encoded.filter ? [encoded.filter] : [],
    data: encoded.data,
    ...(encoded.decodeParms ? { decodeParms: encoded.decodeParms } : {}),
  };
}

/** The gray version of an inline image, or undefined when it is kept unchanged */
export function convertInlineImageToGray(
  image: PdfInlineImage,
  resources: ResourceScope,
  codec: ImageCodec,
): PdfInlineImage | undefined {
  const source = inlineImageSource(image, resources);
  const reason = grayImageSkipReason(source);
  if (reason) {
    getLogger().debug(`Skipping inline image: ${reason}`);
    return undefined;
  }

  const { raw, encoded } = encodeGray(source, codec, 'inline image');
  const base = dictWithout(
    image.dict,
    'W', 'Width', 'H', 'Height', 'CS', 'ColorSpace', 'BPC', 'BitsPerComponent',
    'F', 'Filter', 'DP', 'DecodeParms', 'D', 'Decode',
  );
  const entries = new Map<string, PdfObject>([
    ['W', pdfNumber(raw.width)],
    ['H', pdfNumber(raw.height)],
    ['CS', pdfName('G')],
    ['BPC', pdfNumber(8)],
    ...base.entries,
  ]);
  if (encoded.filter) entries.set('F', pdfName(encoded.filter));
  if (encoded.decodeParms) entries.set('DP', encoded.decodeParms);
  return pdfInlineImage(pdfDict(entries), encoded.data);
}

/**
 * Decode to gray and encode with the image's own filter. A DCT encoder is
 * asked for one component; when the codec refuses the parameters the image
 * is stored with Flate instead.
 */
function encodeGray(source: ImageSource, codec: ImageCodec, label: string): { raw: RawImage; encoded: EncodedImageData } {
  const { rgb, width, height } = decodeToRGB(source, codec);
  const raw = rgbToGrayImage(rgb, width, height);
  const filter = source.filter;
  try {
    return { raw, encoded: codec.encode(raw, filter === 'DCTDecode' ? { filter, colorComponents: 1 } : { filter }) };
  } catch (err) {
    if (!(err instanceof UnsupportedEncodingParametersError)) throw err;
    getLogger().warn(`Re-encoding ${label} with FlateDecode: ${err.message}`);
    return { raw, encoded: codec.encode(raw, { filter: 'FlateDecode' }) };
  }
}
