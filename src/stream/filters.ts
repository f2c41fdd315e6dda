/**
 * Stream filters.
 *
 * Each general-purpose filter is a decode function, plus an encode function
 * where images may be re-encoded with it. Flate goes through the injected
 * implementation in ./flate-impl.ts. Image-format filters (DCT, JPX, CCITT,
 * JBIG2) are not byte transforms and have no entry here.
 */

import { inflate, deflate } from './flate-impl.js';
import { hexValue, isWhitespace } from '../parser/lexer.js';
import { dictGetNumber, type PdfDict } from '../parser/types.js';
import { PdfParseError, PdfUnsupportedError } from '../errors.js';

export interface StreamFilter {
  decode(data: Uint8Array, parms?: PdfDict): Uint8Array;
  encode?(data: Uint8Array): Uint8Array;
}

export function flateDecode(data: Uint8Array): Uint8Array {
  try {
    return inflate(data);
  } catch (err) {
    const reason = err instanceof Error ? `: ${err.message}` : '';
    throw new PdfParseError(`FlateDecode decompression failed${reason}`);
  }
}

export function flateEncode(data: Uint8Array): Uint8Array {
  return deflate(data);
}

// ─── ASCIIHexDecode ───

const HEX_DIGITS = new TextEncoder().encode('0123456789ABCDEF');
const EOD_HEX = 0x3e; // >

export function asciiHexDecode(data: Uint8Array): Uint8Array {
  const out = new Uint8Array(Math.ceil(data.length / 2));
  let n = 0;
  let nibbles = 0;
  for (const c of data) {
    if (c === EOD_HEX) break;
    const v = hexValue(c);
    if (v < 0) {
      if (isWhitespace(c)) continue;
      throw new PdfParseError(`Invalid byte 0x${c.toString(16)} in ASCIIHexDecode data`);
    }
    // High nibble first; a lone final digit keeps a zero low nibble
    if (nibbles++ % 2 === 0) out[n] = v << 4;
    else out[n++] |= v;
  }
  return out.slice(0, n + (nibbles % 2));
}

export function asciiHexEncode(data: Uint8Array): Uint8Array {
  const out = new Uint8Array(data.length * 2 + 1);
  data.forEach((byte, i) => {
    out[2 * i] = HEX_DIGITS[byte >> 4];
    out[2 * i + 1] = HEX_DIGITS[byte & 0xf];
  });
  out[out.length - 1] = EOD_HEX;
  return out;
}

// ─── ASCII85Decode ───

const A85_ZERO = 0x7a; // z
const A85_TILDE = 0x7e;

/** Big-endian bytes of a 32-bit group */
function groupBytes(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

export function ascii85Decode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let value = 0;
  let digits = 0;
  const start = data[0] === 0x3c && data[1] === A85_TILDE ? 2 : 0;

  for (let i = start; i < data.length; i++) {
    const c = data[i];
    if (c === A85_TILDE) break;
    if (isWhitespace(c)) continue;
    if (c === A85_ZERO && digits === 0) {
      out.push(0, 0, 0, 0);
      continue;
    }
    if (c < 0x21 || c > 0x75) throw new PdfParseError(`Invalid byte 0x${c.toString(16)} in ASCII85Decode data`);
    value = value * 85 + (c - 0x21);
    if (++digits === 5) {
      out.push(...groupBytes(value));
      value = 0;
      digits = 0;
    }
  }

  if (digits === 1) throw new PdfParseError('ASCII85Decode data ends with a single digit');
  if (digits > 1) {
    // Pad the short group with the highest digit and keep digits - 1 bytes
    for (let d = digits; d < 5; d++) value = value * 85 + 84;
    out.push(...groupBytes(value).slice(0, digits - 1));
  }
  return new Uint8Array(out);
}

export function ascii85Encode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < data.length; i += 4) {
    const chunk = data.subarray(i, i + 4);
    let value = 0;
    for (let j = 0; j < 4; j++) value = value * 256 + (chunk[j] ?? 0);
    if (chunk.length === 4 && value === 0) {
      out.push(A85_ZERO);
      continue;
    }
    const group: number[] = [];
    for (let j = 0; j < 5; j++) {
      group.unshift((value % 85) + 0x21);
      value = Math.floor(value / 85);
    }
    out.push(...group.slice(0, chunk.length + 1));
  }
  out.push(A85_TILDE, EOD_HEX);
  return new Uint8Array(out);
}

// ─── RunLengthDecode ───

const RL_EOD = 128;

export function runLengthDecode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < data.length && data[i] !== RL_EOD) {
    const length = data[i++];
    if (length < RL_EOD) {
      out.push(...data.subarray(i, i + length + 1));
      i += length + 1;
    } else if (i < data.length) {
      out.push(...new Array<number>(257 - length).fill(data[i++]));
    }
  }
  return new Uint8Array(out);
}

/** Length of the run of equal bytes starting at `i`, at most 128 */
function repeatLength(data: Uint8Array, i: number): number {
  let n = 1;
  while (n < 128 && data[i + n] === data[i]) n++;
  return n;
}

export function runLengthEncode(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let i = 0;
  while (i < data.length) {
    const repeat = repeatLength(data, i);
    if (repeat > 1) {
      out.push(257 - repeat, data[i]);
      i += repeat;
      continue;
    }
    let end = i + 1;
    while (end < data.length && end - i < 128 && repeatLength(data, end) === 1) end++;
    out.push(end - i - 1, ...data.subarray(i, end));
    i = end;
  }
  out.push(RL_EOD);
  return new Uint8Array(out);
}

// ─── LZWDecode ───

const LZW_CLEAR = 256;
const LZW_EOD = 257;

function extend(entry: Uint8Array, byte: number): Uint8Array {
  const next = new Uint8Array(entry.length + 1);
  next.set(entry);
  next[entry.length] = byte;
  return next;
}

export function lzwDecode(data: Uint8Array, earlyChange = 1): Uint8Array {
  const out: number[] = [];
  const table: Uint8Array[] = [];
  for (let b = 0; b < 256; b++) table.push(Uint8Array.of(b));
  table.push(new Uint8Array(0), new Uint8Array(0));

  let width = 9;
  let previous: Uint8Array | undefined;
  let buffer = 0;
  let bits = 0;

  for (const byte of data) {
    buffer = ((buffer << 8) | byte) & 0xffffff;
    bits += 8;
    while (bits >= width) {
      bits -= width;
      const code = (buffer >>> bits) & ((1 << width) - 1);
      if (code === LZW_EOD) return new Uint8Array(out);
      if (code === LZW_CLEAR) {
        table.length = 258;
        width = 9;
        previous = undefined;
        continue;
      }

      let entry: Uint8Array;
      if (code < table.length) entry = table[code];
      else if (code === table.length && previous) entry = extend(previous, previous[0]);
      else throw new PdfParseError(`Invalid LZW code ${code}`);

      out.push(...entry);
      if (previous) table.push(extend(previous, entry[0]));
      previous = entry;
      if (table.length + earlyChange >= 1 << width && width < 12) width++;
    }
  }
  return new Uint8Array(out);
}

// ─── Predictors ───

function paeth(left: number, up: number, upLeft: number): number {
  const p = left + up - upLeft;
  const pl = Math.abs(p - left);
  const pu = Math.abs(p - up);
  const pul = Math.abs(p - upLeft);
  if (pl <= pu && pl <= pul) return left;
  return pu <= pul ? up : upLeft;
}

function pngPrediction(type: number, left: number, up: number, upLeft: number): number {
  switch (type) {
    case 1: return left;
    case 2: return up;
    case 3: return (left + up) >> 1;
    case 4: return paeth(left, up, upLeft);
    default: return 0;
  }
}

/** Undo PNG row filters; every row starts with its filter type byte */
export function applyPNGPredictor(data: Uint8Array, columns: number, colors = 1, bitsPerComponent = 8): Uint8Array {
  const stride = Math.ceil((columns * colors * bitsPerComponent) / 8);
  if (stride <= 0) return data;
  const bpp = Math.max(1, Math.ceil((colors * bitsPerComponent) / 8));
  const rows = Math.floor(data.length / (stride + 1));
  const out = new Uint8Array(rows * stride);

  let above = new Uint8Array(stride);
  for (let r = 0; r < rows; r++) {
    const type = data[r * (stride + 1)];
    const src = data.subarray(r * (stride + 1) + 1, (r + 1) * (stride + 1));
    const row = out.subarray(r * stride, (r + 1) * stride);
    for (let i = 0; i < stride; i++) {
      const left = i >= bpp ? row[i - bpp] : 0;
      const upLeft = i >= bpp ? above[i - bpp] : 0;
      row[i] = src[i] + pngPrediction(type, left, above[i], upLeft);
    }
    above = row;
  }
  return out;
}

/** Undo TIFF predictor 2 on 8-bit samples */
export function applyTIFFPredictor(data: Uint8Array, columns: number, colors = 1, bitsPerComponent = 8): Uint8Array {
  if (bitsPerComponent !== 8) {
    throw new PdfUnsupportedError(`TIFF predictor with ${bitsPerComponent} bits per component`);
  }
  const out = Uint8Array.from(data);
  const stride = columns * colors;
  for (let rowStart = 0; rowStart < out.length; rowStart += stride) {
    for (let i = rowStart + colors; i < Math.min(rowStart + stride, out.length); i++) out[i] += out[i - colors];
  }
  return out;
}

/** Apply the /Predictor named in DecodeParms, if any */
export function undoPredictor(data: Uint8Array, parms?: PdfDict): Uint8Array {
  if (!parms) return data;
  const predictor = dictGetNumber(parms, 'Predictor') ?? 1;
  const columns = dictGetNumber(parms, 'Columns') ?? 1;
  const colors = dictGetNumber(parms, 'Colors') ?? 1;
  const bpc = dictGetNumber(parms, 'BitsPerComponent') ?? 8;
  if (predictor >= 10) return applyPNGPredictor(data, columns, colors, bpc);
  if (predictor === 2) return applyTIFFPredictor(data, columns, colors, bpc);
  return data;
}

const FILTERS = new Map<string, StreamFilter>([
  ['FlateDecode', { decode: (data, parms) => undoPredictor(flateDecode(data), parms), encode: flateEncode }],
  ['LZWDecode', {
    decode: (data, parms) => undoPredictor(lzwDecode(data, parms ? dictGetNumber(parms, 'EarlyChange') ?? 1 : 1), parms),
  }],
  ['ASCIIHexDecode', { decode: asciiHexDecode, encode: asciiHexEncode }],
  ['ASCII85Decode', { decode: ascii85Decode, encode: ascii85Encode }],
  ['RunLengthDecode', { decode: runLengthDecode, encode: runLengthEncode }],
]);

/** The byte filter with this (full) name, or undefined for image formats and unknown names */
export function streamFilter(name: string): StreamFilter | undefined {
  return FILTERS.get(name);
}
