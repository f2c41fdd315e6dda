/**
 * Image codec: decodes image data to raw samples and encodes raw samples
 * with a requested filter.
 *
 * The default codec handles the general-purpose filters through the stream
 * filters and DCTDecode through jpeg-js. JPX, CCITT and JBIG2 payloads are
 * not decoded.
 */

import jpeg from 'jpeg-js';
import type { PdfDict } from '../parser/types.js';
import { PdfUnsupportedError, UnsupportedEncodingParametersError } from '../errors.js';
import { applyFilter, normalizeFilterName, type FilterSpec } from '../stream/decoder.js';
import { streamFilter } from '../stream/filters.js';
import type { RawImage } from './raster.js';

/** Image data as stored in a PDF, before any filter is undone */
export interface EncodedImage {
  readonly width: number;
  readonly height: number;
  readonly bitsPerComponent: number;
  readonly colorComponents: number;
  /** Filter chain, outermost first */
  readonly filters: readonly FilterSpec[];
  readonly data: Uint8Array;
}

export interface EncodeRequest {
  /** Filter to encode with; undefined stores the samples unfiltered */
  readonly filter?: string;
  /** Component count the encoder is configured for (DCT only) */
  readonly colorComponents?: number;
  /** JPEG quality, 1-100 */
  readonly quality?: number;
}

export interface EncodedImageData {
  readonly filter?: string;
  readonly decodeParms?: PdfDict;
  readonly data: Uint8Array;
}

export interface ImageCodec {
  decode(image: EncodedImage): RawImage;
  encode(image: RawImage, request: EncodeRequest): EncodedImageData;
}

/** Filters whose payload is an image format rather than a byte transform */
export const IMAGE_FILTERS = new Set(['DCTDecode', 'JPXDecode', 'CCITTFaxDecode', 'JBIG2Decode']);

const DEFAULT_JPEG_QUALITY = 90;

/**
 * Decodes the byte filters and DCTDecode; encodes the byte filters and
 * DCTDecode for three components only. jpeg-js writes no single-component
 * JPEG, so a gray DCT request raises UnsupportedEncodingParametersError and
 * the transformer stores the image with FlateDecode instead, which is
 * usually larger than the JPEG it replaces.
 */
export const defaultImageCodec: ImageCodec = {
  decode(image: EncodedImage): RawImage {
    let data = image.data;
    for (const filter of image.filters) {
      const name = normalizeFilterName(filter.name);
      if (name === 'DCTDecode') return decodeJpeg(data);
      if (IMAGE_FILTERS.has(name)) throw new PdfUnsupportedError(`Cannot decode ${name} images`);
      data = applyFilter(data, name, filter.parms);
    }
    return {
      width: image.width,
      height: image.height,
      colorComponents: image.colorComponents,
      bitsPerComponent: image.bitsPerComponent,
      samples: data,
    };
  },

  encode(image: RawImage, request: EncodeRequest): EncodedImageData {
    const filter = request.filter ? normalizeFilterName(request.filter) : undefined;
    if (filter === undefined) return { data: image.samples };
    if (filter === 'DCTDecode') return { filter, data: encodeJpeg(image, request) };
    const encoder = streamFilter(filter)?.encode;
    if (!encoder) throw new UnsupportedEncodingParametersError(filter);
    return { filter, data: encoder(image.samples) };
  },
};

function decodeJpeg(data: Uint8Array): RawImage {
  const decoded = jpeg.decode(data, { useTArray: true, formatAsRGBA: true });
  const pixels = decoded.width * decoded.height;
  const samples = new Uint8Array(pixels * 3);
  for (let p = 0; p < pixels; p++) {
    samples[p * 3] = decoded.data[p * 4];
    samples[p * 3 + 1] = decoded.data[p * 4 + 1];
    samples[p * 3 + 2] = decoded.data[p * 4 + 2];
  }
  return { width: decoded.width, height: decoded.height, colorComponents: 3, bitsPerComponent: 8, samples };
}

function encodeJpeg(image: RawImage, request: EncodeRequest): Uint8Array {
  const components = request.colorComponents ?? image.colorComponents;
  // The JPEG encoder only writes three-component (YCbCr) images
  if (components !== 3 || image.colorComponents !== 3 || image.bitsPerComponent !== 8) {
    throw new UnsupportedEncodingParametersError(
      'DCTDecode',
      `DCTDecode encoding needs 3 components at 8 bits, got ${components} at ${image.bitsPerComponent}`,
    );
  }
  const pixels = image.width * image.height;
  const rgba = new Uint8Array(pixels * 4);
  for (let p = 0; p < pixels; p++) {
    rgba[p * 4] = image.samples[p * 3];
    rgba[p * 4 + 1] = image.samples[p * 3 + 1];
    rgba[p * 4 + 2] = image.samples[p * 3 + 2];
    rgba[p * 4 + 3] = 0xff;
  }
  const encoded = jpeg.encode({ width: image.width, height: image.height, data: rgba }, request.quality ?? DEFAULT_JPEG_QUALITY);
  return new Uint8Array(encoded.data);
}
