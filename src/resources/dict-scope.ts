/**
 * Resource scope over a PDF /Resources dictionary.
 *
 * Entries are parsed on first lookup and cached, so repeated lookups of a
 * name return the same object. Writes replace the cached value and are
 * serialized back into the dictionary; an entry stored behind an indirect
 * reference is written through the resolver when it supports updates.
 */

import type { ObjectResolver, PdfDict, PdfObject } from '../parser/types.js';
import {
  pdfArray, pdfBool, pdfDict, pdfName, pdfNumber, pdfStream,
  dictGet, dictGetBool, dictGetNumber, dictGetNumbers, dictWithout, isDict, isName, isRef, isStream, PDF_NULL,
} from '../parser/types.js';
import { PdfParseError } from '../errors.js';
import type { Colorspace } from '../color/colorspace.js';
import { DEVICE_GRAY } from '../color/colorspace.js';
import { decodeStream, getFilters, type ResolveFn } from '../stream/decoder.js';
import { flateEncode } from '../stream/filters.js';
import { parseContentStream } from '../content/parser.js';
import { serializeContentStream } from '../content/writer.js';
import type { ContentStream } from '../content/operators.js';
import { colorspaceToPdfObject, parseColorspace } from './colorspace-object.js';
import type {
  FormXObject, ImageXObject, Pattern, ResourceScope, Shading, XObject,
} from './types.js';

const DIRECT_RESOLVER: ObjectResolver = { resolve: (obj) => obj };

type Category = 'ColorSpace' | 'Pattern' | 'Shading' | 'XObject';

export class PdfResourceScope implements ResourceScope {
  private readonly colorspaces = new Map<string, Colorspace>();
  private readonly patterns = new Map<string, Pattern>();
  private readonly shadings = new Map<string, Shading>();
  private readonly xobjects = new Map<string, XObject>();
  private readonly resolve: ResolveFn;

  constructor(
    readonly dict: PdfDict,
    private readonly resolver: ObjectResolver = DIRECT_RESOLVER,
    private readonly parent?: ResourceScope,
    /** Stands in for a /Resources entry the owning stream does not have */
    private readonly synthesized = false,
  ) {
    this.resolve = (obj) => resolver.resolve(obj);
  }

  /** The dictionary to write back as /Resources, or undefined when a stand-in scope was never written to */
  get resourcesEntry(): PdfDict | undefined {
    return this.synthesized && this.dict.entries.size === 0 ? undefined : this.dict;
  }

  // ─── Lookups ───

  getColorspace(name: string): Colorspace | undefined {
    return this.lookup(this.colorspaces, 'ColorSpace', name, (obj) => parseColorspace(obj, this.resolve))
      ?? this.parent?.getColorspace(name);
  }

  getPattern(name: string): Pattern | undefined {
    return this.lookup(this.patterns, 'Pattern', name, (obj) => this.parsePattern(obj))
      ?? this.parent?.getPattern(name);
  }

  getShading(name: string): Shading | undefined {
    return this.lookup(this.shadings, 'Shading', name, (obj) => this.parseShading(obj))
      ?? this.parent?.getShading(name);
  }

  getXObject(name: string): XObject | undefined {
    return this.lookup(this.xobjects, 'XObject', name, (obj) => this.parseXObject(obj))
      ?? this.parent?.getXObject(name);
  }

  // ─── Writes ───

  setColorspace(name: string, colorspace: Colorspace): void {
    this.colorspaces.set(name, colorspace);
    this.store('ColorSpace', name, colorspaceToPdfObject(colorspace));
  }

  setPattern(name: string, pattern: Pattern): void {
    this.patterns.set(name, pattern);
    this.store('Pattern', name, patternToPdfObject(pattern));
  }

  setShading(name: string, shading: Shading): void {
    this.shadings.set(name, shading);
    this.store('Shading', name, shadingToPdfObject(shading));
  }

  setXObject(name: string, xobject: XObject): void {
    this.xobjects.set(name, xobject);
    this.store('XObject', name, xobject.kind === 'image' ? imageToPdfObject(xobject) : formToPdfObject(xobject));
  }

  // ─── Internals ───

  private category(key: Category, create: boolean): PdfDict | undefined {
    const entry = dictGet(this.dict, key);
    if (entry) {
      const resolved = this.resolve(entry);
      return isDict(resolved) ? resolved : undefined;
    }
    if (!create) return undefined;
    const sub = pdfDict();
    this.dict.entries.set(key, sub);
    return sub;
  }

  private lookup<T>(cache: Map<string, T>, key: Category, name: string, parse: (obj: PdfObject) => T): T | undefined {
    const cached = cache.get(name);
    if (cached !== undefined) return cached;
    const entry = this.category(key, false)?.entries.get(name);
    if (!entry) return undefined;
    const value = parse(this.resolve(entry));
    cache.set(name, value);
    return value;
  }

  private store(key: Category, name: string, obj: PdfObject): void {
    const sub = this.category(key, true);
    if (!sub) throw new PdfParseError(`/${key} resource entry is not a dictionary`);
    const existing = sub.entries.get(name);
    if (existing && isRef(existing) && this.resolver.update) {
      this.resolver.update(existing, obj);
    } else {
      sub.entries.set(name, obj);
    }
  }

  private childScope(resources: PdfObject | undefined): PdfResourceScope | undefined {
    if (!resources) return undefined;
    const dict = this.resolve(resources);
    return isDict(dict) ? new PdfResourceScope(dict, this.resolver, this) : undefined;
  }

  private parseContent(data: Uint8Array, dict: PdfDict): ContentStream {
    return parseContentStream(decodeStream(data, dict, this.resolve));
  }

  private parsePattern(obj: PdfObject): Pattern {
    if (isStream(obj)) {
      return {
        kind: 'tiling',
        content: this.parseContent(obj.data, obj.dict),
        resources: this.childScope(dictGet(obj.dict, 'Resources'))
          ?? new PdfResourceScope(pdfDict(), this.resolver, this, true),
        colored: dictGetNumber(obj.dict, 'PaintType') !== 2,
        dict: obj.dict,
      };
    }
    if (isDict(obj) && dictGetNumber(obj, 'PatternType') === 2) {
      const shading = dictGet(obj, 'Shading');
      if (!shading) throw new PdfParseError('Shading pattern has no /Shading');
      return { kind: 'shading', shading: this.parseShading(this.resolve(shading)), dict: obj };
    }
    throw new PdfParseError('Pattern must be a tiling pattern stream or a shading pattern dictionary');
  }

  private parseShading(obj: PdfObject): Shading {
    const dict = isStream(obj) ? obj.dict : obj;
    if (!isDict(dict)) throw new PdfParseError('Shading must be a dictionary or stream');
    const space = dictGet(dict, 'ColorSpace');
    if (!space) throw new PdfParseError('Shading has no /ColorSpace');
    const colorspace = parseColorspace(space, this.resolve);
    return isStream(obj)
      ? { colorspace, dict, data: decodeStream(obj.data, obj.dict, this.resolve) }
      : { colorspace, dict };
  }

  private parseXObject(obj: PdfObject): XObject {
    if (!isStream(obj)) throw new PdfParseError('XObject must be a stream');
    const dict = obj.dict;
    const subtype = dictGet(dict, 'Subtype');
    const subtypeObj = subtype ? this.resolve(subtype) : undefined;

    if (subtypeObj && isName(subtypeObj) && subtypeObj.value === 'Form') {
      const form: FormXObject = {
        kind: 'form',
        content: this.parseContent(obj.data, dict),
        dict,
      };
      const resources = this.childScope(dictGet(dict, 'Resources'));
      return resources ? { ...form, resources } : form;
    }

    const imageMask = dictGetBool(dict, 'ImageMask') ?? false;
    const space = dictGet(dict, 'ColorSpace');
    const filters = getFilters(dict, this.resolve);
    const decodeParms = filters.length > 0 ? filters[filters.length - 1].parms : undefined;
    const decode = dictGetNumbers(dict, 'Decode');
    const softMask = dictGet(dict, 'SMask');
    return {
      kind: 'image',
      width: dictGetNumber(dict, 'Width') ?? 0,
      height: dictGetNumber(dict, 'Height') ?? 0,
      colorspace: space && !imageMask ? parseColorspace(space, this.resolve) : DEVICE_GRAY,
      bitsPerComponent: imageMask ? 1 : (dictGetNumber(dict, 'BitsPerComponent') ?? 8),
      filters: filters.map((f) => f.name),
      data: obj.data,
      dict,
      ...(decodeParms ? { decodeParms } : {}),
      ...(decode ? { decode } : {}),
      ...(softMask ? { softMask } : {}),
      ...(imageMask ? { imageMask } : {}),
    };
  }
}

// ─── Serialization ───

function contentStreamObject(dict: PdfDict, content: ContentStream): PdfObject {
  const data = flateEncode(serializeContentStream(content));
  const entries = new Map(dictWithout(dict, 'Filter', 'DecodeParms', 'Length').entries);
  entries.set('Filter', pdfName('FlateDecode'));
  entries.set('Length', pdfNumber(data.length));
  return pdfStream(pdfDict(entries), data);
}

function scopeDict(scope: ResourceScope | undefined): PdfDict | undefined {
  return scope instanceof PdfResourceScope ? scope.resourcesEntry : undefined;
}

export function shadingToPdfObject(shading: Shading): PdfObject {
  const entries = new Map(dictWithout(shading.dict ?? pdfDict(), 'Filter', 'DecodeParms', 'Length').entries);
  entries.set('ColorSpace', colorspaceToPdfObject(shading.colorspace));
  if (!shading.data) return pdfDict(entries);
  entries.set('Length', pdfNumber(shading.data.length));
  return pdfStream(pdfDict(entries), shading.data);
}

export function patternToPdfObject(pattern: Pattern): PdfObject {
  const entries = new Map(pattern.dict?.entries ?? []);
  entries.set('Type', pdfName('Pattern'));

  if (pattern.kind === 'shading') {
    entries.set('PatternType', pdfNumber(2));
    entries.set('Shading', shadingToPdfObject(pattern.shading));
    return pdfDict(entries);
  }

  entries.set('PatternType', pdfNumber(1));
  entries.set('PaintType', pdfNumber(pattern.colored ? 1 : 2));
  if (!entries.has('TilingType')) entries.set('TilingType', pdfNumber(1));
  const resources = scopeDict(pattern.resources);
  if (resources) entries.set('Resources', resources);
  return contentStreamObject(pdfDict(entries), pattern.content);
}

export function formToPdfObject(form: FormXObject): PdfObject {
  const entries = new Map(form.dict?.entries ?? []);
  entries.set('Type', pdfName('XObject'));
  entries.set('Subtype', pdfName('Form'));
  const resources = scopeDict(form.resources);
  if (resources) entries.set('Resources', resources);
  return contentStreamObject(pdfDict(entries), form.content);
}

export function imageToPdfObject(image: ImageXObject): PdfObject {
  const base = dictWithout(
    image.dict ?? pdfDict(),
    'Filter', 'DecodeParms', 'ColorSpace', 'BitsPerComponent', 'Decode', 'Length', 'SMask', 'ImageMask',
  );
  const entries = new Map(base.entries);
  entries.set('Type', pdfName('XObject'));
  entries.set('Subtype', pdfName('Image'));
  entries.set('Width', pdfNumber(image.width));
  entries.set('Height', pdfNumber(image.height));
  entries.set('BitsPerComponent', pdfNumber(image.bitsPerComponent));

  if (image.imageMask) {
    entries.set('ImageMask', pdfBool(true));
  } else {
    entries.set('ColorSpace', colorspaceToPdfObject(image.colorspace));
  }
  if (image.filters.length === 1) {
    entries.set('Filter', pdfName(image.filters[0]));
  } else if (image.filters.length > 1) {
    entries.set('Filter', pdfArray(image.filters.map(pdfName)));
  }
  if (image.decodeParms) {
    // Parameters belong to the last filter of the chain
    entries.set('DecodeParms', image.filters.length > 1
      ? pdfArray([...image.filters.slice(1).map(() => PDF_NULL), image.decodeParms])
      : image.decodeParms);
  }
  if (image.decode) entries.set('Decode', pdfArray(image.decode.map(pdfNumber)));
  if (image.softMask) entries.set('SMask', image.softMask);
  entries.set('Length', pdfNumber(image.data.length));
  return pdfStream(pdfDict(entries), image.data);
}
