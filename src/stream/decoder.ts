/**
 * Filter chains of stream and inline-image dictionaries.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import { dictGet, isArray, isName, isDict } from '../parser/types.js';
import { streamFilter } from './filters.js';

export type ResolveFn = (obj: PdfObject) => PdfObject;

/** One entry of a filter chain */
export interface FilterSpec {
  readonly name: string;
  readonly parms?: PdfDict;
}

/** Inline images may spell filters in short form */
const SHORT_FILTER_NAMES: ReadonlyMap<string, string> = new Map([
  ['AHx', 'ASCIIHexDecode'],
  ['A85', 'ASCII85Decode'],
  ['LZW', 'LZWDecode'],
  ['Fl', 'FlateDecode'],
  ['RL', 'RunLengthDecode'],
  ['CCF', 'CCITTFaxDecode'],
  ['CCITTDecode', 'CCITTFaxDecode'],
  ['DCT', 'DCTDecode'],
]);

export function normalizeFilterName(name: string): string {
  return SHORT_FILTER_NAMES.get(name) ?? name;
}

const identity: ResolveFn = (obj) => obj;

/**
 * The filter chain of a stream dictionary, outermost first. /DecodeParms may
 * be a single dictionary or an array parallel to /Filter. Only inline images
 * spell them F and DP; on a stream, /F names an external file.
 */
export function getFilters(dict: PdfDict, resolve: ResolveFn = identity, inline = false): FilterSpec[] {
  const filterEntry = dictGet(dict, 'Filter') ?? (inline ? dictGet(dict, 'F') : undefined);
  if (filterEntry === undefined) return [];
  const parmsEntry = dictGet(dict, 'DecodeParms') ?? (inline ? dictGet(dict, 'DP') : undefined);

  const filter = resolve(filterEntry);
  const parms = parmsEntry === undefined ? undefined : resolve(parmsEntry);
  const names = isArray(filter) ? filter.items.map(resolve) : [filter];
  const parmsList = parms !== undefined && isArray(parms) ? parms.items.map(resolve) : undefined;

  const chain: FilterSpec[] = [];
  names.forEach((name, i) => {
    if (!isName(name)) return;
    const p = parmsList ? parmsList[i] : parms;
    chain.push({ name: normalizeFilterName(name.value), parms: p !== undefined && isDict(p) ? p : undefined });
  });
  return chain;
}

/**
 * Apply one filter. Image-format filters, and names with no decoder, leave
 * the data as it is.
 */
export function applyFilter(data: Uint8Array, filterName: string, parms?: PdfDict): Uint8Array {
  const filter = streamFilter(normalizeFilterName(filterName));
  return filter ? filter.decode(data, parms) : data;
}

export function decodeStream(data: Uint8Array, dict: PdfDict, resolve?: ResolveFn): Uint8Array {
  return getFilters(dict, resolve).reduce((bytes, f) => applyFilter(bytes, f.name, f.parms), data);
}
