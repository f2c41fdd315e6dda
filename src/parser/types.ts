/**
 * Object model shared by content-stream operands and the resource
 * dictionaries a content stream draws on.
 *
 * Every object is a plain record tagged by `kind`; the per-kind types are
 * carved out of the `PdfObject` union so a `switch` on `kind` narrows.
 */

export type PdfObject =
  | { readonly kind: 'ref'; readonly objNum: number; readonly gen: number }
  | { readonly kind: 'name'; readonly value: string }
  | { readonly kind: 'string'; readonly value: Uint8Array }
  | { readonly kind: 'dict'; readonly entries: Map<string, PdfObject> }
  | { readonly kind: 'array'; readonly items: PdfObject[] }
  | { readonly kind: 'stream'; readonly dict: PdfDict; readonly data: Uint8Array }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'null' };

export type PdfKind = PdfObject['kind'];

/** The member of `PdfObject` with the given kind */
export type PdfOf<K extends PdfKind> = Extract<PdfObject, { readonly kind: K }>;

export type PdfRef = PdfOf<'ref'>;
export type PdfName = PdfOf<'name'>;
export type PdfString = PdfOf<'string'>;
export type PdfDict = PdfOf<'dict'>;
export type PdfArray = PdfOf<'array'>;
export type PdfStream = PdfOf<'stream'>;
export type PdfNumber = PdfOf<'number'>;

/**
 * BI <dict> ID <data> EI. The dictionary keeps whatever spelling the
 * stream used, abbreviated (W, H, CS, BPC, F, DP, IM) or not.
 */
export interface PdfInlineImage {
  readonly kind: 'inlineImage';
  readonly dict: PdfDict;
  readonly data: Uint8Array;
}

/** What an operator can take: a direct object, or the image BI carries */
export type Operand = PdfObject | PdfInlineImage;

/**
 * Follows indirect references in resource dictionaries. `update` is how
 * the transformer writes a converted object back behind its reference.
 */
export interface ObjectResolver {
  resolve(obj: PdfObject): PdfObject;
  update?(ref: PdfRef, obj: PdfObject): void;
}

export const PDF_NULL: PdfOf<'null'> = { kind: 'null' };

export const pdfRef = (objNum: number, gen: number): PdfRef => ({ kind: 'ref', objNum, gen });
export const pdfName = (value: string): PdfName => ({ kind: 'name', value });
export const pdfString = (value: Uint8Array): PdfString => ({ kind: 'string', value });
export const pdfStringFromText = (text: string): PdfString => pdfString(new TextEncoder().encode(text));
export const pdfDict = (entries: Map<string, PdfObject> = new Map()): PdfDict => ({ kind: 'dict', entries });
export const pdfArray = (items: PdfObject[] = []): PdfArray => ({ kind: 'array', items });
export const pdfStream = (dict: PdfDict, data: Uint8Array): PdfStream => ({ kind: 'stream', dict, data });
export const pdfBool = (value: boolean): PdfOf<'bool'> => ({ kind: 'bool', value });
export const pdfNumber = (value: number): PdfNumber => ({ kind: 'number', value });

export function pdfInlineImage(dict: PdfDict, data: Uint8Array): PdfInlineImage {
  return { kind: 'inlineImage', dict, data };
}

function guard<K extends PdfKind>(kind: K) {
  return (obj: PdfObject): obj is PdfOf<K> => obj.kind === kind;
}

export const isRef = guard('ref');
export const isName = guard('name');
export const isString = guard('string');
export const isDict = guard('dict');
export const isArray = guard('array');
export const isStream = guard('stream');
export const isNumber = guard('number');

// Dictionary access. The typed getters return undefined both for a
// missing key and for a value of another kind.

export function dictGet(dict: PdfDict, key: string): PdfObject | undefined {
  return dict.entries.get(key);
}

export function dictGetOf<K extends PdfKind>(dict: PdfDict, key: string, kind: K): PdfOf<K> | undefined {
  const obj = dict.entries.get(key);
  return obj !== undefined && guard(kind)(obj) ? obj : undefined;
}

export function dictGetName(dict: PdfDict, key: string): string | undefined {
  return dictGetOf(dict, key, 'name')?.value;
}

export function dictGetNumber(dict: PdfDict, key: string): number | undefined {
  return dictGetOf(dict, key, 'number')?.value;
}

export function dictGetBool(dict: PdfDict, key: string): boolean | undefined {
  return dictGetOf(dict, key, 'bool')?.value;
}

/** A numeric array entry such as /Decode or /BBox; undefined if any item is not a number */
export function dictGetNumbers(dict: PdfDict, key: string): number[] | undefined {
  const array = dictGetOf(dict, key, 'array');
  if (array === undefined) return undefined;
  const numbers = array.items.filter(isNumber);
  return numbers.length === array.items.length ? numbers.map((n) => n.value) : undefined;
}

/** Shallow copy without the given keys */
export function dictWithout(dict: PdfDict, ...keys: string[]): PdfDict {
  const entries = new Map(dict.entries);
  for (const key of keys) entries.delete(key);
  return pdfDict(entries);
}
