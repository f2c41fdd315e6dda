/**
 * Resource types drawn on by content streams, and the scope they are looked up in.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import type { ContentStream } from '../content/operators.js';
import type { Colorspace } from '../color/colorspace.js';

export interface Shading {
  readonly colorspace: Colorspace;
  /** The shading dictionary; holds the paint parameters (ShadingType, Coords, Function, ...) */
  readonly dict?: PdfDict;
  /** Vertex data of mesh shadings (types 4-7) */
  readonly data?: Uint8Array;
}

export interface TilingPattern {
  readonly kind: 'tiling';
  readonly content: ContentStream;
  readonly resources: ResourceScope;
  /** PaintType 1: the pattern's content sets its own colors */
  readonly colored: boolean;
  readonly dict?: PdfDict;
}

export interface ShadingPattern {
  readonly kind: 'shading';
  readonly shading: Shading;
  readonly dict?: PdfDict;
}

export type Pattern = TilingPattern | ShadingPattern;

export interface ImageXObject {
  readonly kind: 'image';
  readonly width: number;
  readonly height: number;
  readonly colorspace: Colorspace;
  readonly bitsPerComponent: number;
  /** Filter chain, outermost first; the last entry is the image's own encoding */
  readonly filters: readonly string[];
  readonly decodeParms?: PdfDict;
  /** Decode array, when present */
  readonly decode?: readonly number[];
  /** Encoded sample data */
  readonly data: Uint8Array;
  readonly softMask?: PdfObject;
  readonly imageMask?: boolean;
  readonly dict?: PdfDict;
}

export interface FormXObject {
  readonly kind: 'form';
  readonly content: ContentStream;
  readonly resources?: ResourceScope;
  readonly dict?: PdfDict;
}

export type XObject = ImageXObject | FormXObject;

/**
 * Named resources of a page, form or pattern. Lookups fall back to the
 * enclosing scope; writes always land in this scope.
 */
export interface ResourceScope {
  getColorspace(name: string): Colorspace | undefined;
  setColorspace(name: string, colorspace: Colorspace): void;
  getPattern(name: string): Pattern | undefined;
  setPattern(name: string, pattern: Pattern): void;
  getShading(name: string): Shading | undefined;
  setShading(name: string, shading: Shading): void;
  getXObject(name: string): XObject | undefined;
  setXObject(name: string, xobject: XObject): void;
}

/** The image filter an ImageXObject is stored with */
export function imageFilter(image: { readonly filters: readonly string[] }): string | undefined {
  return image.filters.length > 0 ? image.filters[image.filters.length - 1] : undefined;
}
