/**
 * Content Stream Lexer
 *
 * Splits decoded content-stream bytes (and PostScript calculator programs,
 * which share the syntax) into tokens. Operators, `true`, `false` and
 * `null` are all bare words; the lexer sorts them into keyword, bool and
 * null tokens so the parser only has to look at `type`.
 */

import { PdfParseError } from '../errors.js';

export type Delimiter = '[' | ']' | '<<' | '>>' | '{' | '}';

export type Token =
  | { readonly type: 'number'; readonly value: number; readonly offset: number }
  | { readonly type: 'string'; readonly value: Uint8Array; readonly hex: boolean; readonly offset: number }
  | { readonly type: 'name'; readonly value: string; readonly offset: number }
  | { readonly type: 'bool'; readonly value: boolean; readonly offset: number }
  | { readonly type: 'null'; readonly offset: number }
  | { readonly type: 'keyword'; readonly value: string; readonly offset: number }
  | { readonly type: 'delimiter'; readonly value: Delimiter; readonly offset: number }
  | { readonly type: 'eof'; readonly offset: number };

const REGULAR = 0;
const WHITESPACE = 1;
const DELIMITER = 2;

/** Character class of every byte value */
const CHAR_CLASS = new Uint8Array(256);
for (const b of [0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]) CHAR_CLASS[b] = WHITESPACE;
for (const c of '()<>[]{}/%') CHAR_CLASS[c.charCodeAt(0)] = DELIMITER;

export function isWhitespace(byte: number): boolean {
  return byte >= 0 && CHAR_CLASS[byte] === WHITESPACE;
}

function isRegular(byte: number): boolean {
  return byte >= 0 && CHAR_CLASS[byte] === REGULAR;
}

/** Value of a hex digit byte, or -1 */
export function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x37;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x57;
  return -1;
}

/** Single-character string escapes: \n \r \t \b \f */
const ESCAPES: Readonly<Record<number, number>> = {
  0x6e: 0x0a, 0x72: 0x0d, 0x74: 0x09, 0x62: 0x08, 0x66: 0x0c,
};

const NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export class ContentLexer {
  private pos = 0;

  constructor(private readonly data: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  set position(offset: number) {
    this.pos = offset;
  }

  get length(): number {
    return this.data.length;
  }

  /** The byte at `index`, or -1 past the end */
  byteAt(index: number): number {
    return index >= 0 && index < this.data.length ? this.data[index] : -1;
  }

  slice(start: number, end: number): Uint8Array {
    return this.data.subarray(start, end);
  }

  /** Index of the first occurrence of `needle` at or after `from`, or -1 */
  indexOf(needle: Uint8Array, from = this.pos): number {
    outer: for (let i = from; i <= this.data.length - needle.length; i++) {
      for (let j = 0; j < needle.length; j++) {
        if (this.data[i + j] !== needle[j]) continue outer;
      }
      return i;
    }
    return -1;
  }

  next(): Token {
    this.skipWhitespaceAndComments();
    const offset = this.pos;
    const b = this.byteAt(offset);

    switch (b) {
      case -1:
        return { type: 'eof', offset };
      case 0x28: // (
        return { type: 'string', value: this.readLiteralString(), hex: false, offset };
      case 0x3c: // <
        if (this.byteAt(offset + 1) === 0x3c) return this.delimiter('<<');
        return { type: 'string', value: this.readHexString(), hex: true, offset };
      case 0x3e: // >
        if (this.byteAt(offset + 1) === 0x3e) return this.delimiter('>>');
        throw new PdfParseError("Unexpected '>'", offset);
      case 0x29: // )
        throw new PdfParseError("Unexpected ')'", offset);
      case 0x5b:
        return this.delimiter('[');
      case 0x5d:
        return this.delimiter(']');
      case 0x7b:
        return this.delimiter('{');
      case 0x7d:
        return this.delimiter('}');
      case 0x2f: // /
        this.pos++;
        return { type: 'name', value: this.readName(), offset };
      default:
        return this.readWord(offset);
    }
  }

  private delimiter(value: Delimiter): Token {
    const offset = this.pos;
    this.pos += value.length;
    return { type: 'delimiter', value, offset };
  }

  private skipWhitespaceAndComments(): void {
    for (;;) {
      const b = this.byteAt(this.pos);
      if (isWhitespace(b)) {
        this.pos++;
      } else if (b === 0x25) {
        while (this.pos < this.data.length && this.data[this.pos] !== 0x0a && this.data[this.pos] !== 0x0d) this.pos++;
      } else {
        return;
      }
    }
  }

  /** Numbers, operators, true/false/null */
  private readWord(offset: number): Token {
    let end = offset;
    while (isRegular(this.byteAt(end))) end++;
    this.pos = end;

    const word = String.fromCharCode(...this.data.subarray(offset, end));
    if (NUMBER.test(word)) return { type: 'number', value: Number(word), offset };
    switch (word) {
      case 'true':
        return { type: 'bool', value: true, offset };
      case 'false':
        return { type: 'bool', value: false, offset };
      case 'null':
        return { type: 'null', offset };
      default:
        return { type: 'keyword', value: word, offset };
    }
  }

  private readName(): string {
    let name = '';
    while (isRegular(this.byteAt(this.pos))) {
      const c = this.data[this.pos];
      const hi = c === 0x23 ? hexValue(this.byteAt(this.pos + 1)) : -1;
      const lo = hi >= 0 ? hexValue(this.byteAt(this.pos + 2)) : -1;
      if (lo >= 0) {
        name += String.fromCharCode((hi << 4) | lo);
        this.pos += 3;
      } else {
        name += String.fromCharCode(c);
        this.pos++;
      }
    }
    return name;
  }

  private readHexString(): Uint8Array {
    const start = this.pos;
    this.pos++;
    const bytes: number[] = [];
    let pending = -1;

    for (;;) {
      const c = this.byteAt(this.pos++);
      if (c === -1) throw new PdfParseError('Unterminated hex string', start);
      if (c === 0x3e) break;
      const v = hexValue(c);
      if (v < 0) {
        if (isWhitespace(c)) continue;
        throw new PdfParseError(`Invalid byte 0x${c.toString(16)} in hex string`, this.pos - 1);
      }
      if (pending < 0) {
        pending = v;
      } else {
        bytes.push((pending << 4) | v);
        pending = -1;
      }
    }
    if (pending >= 0) bytes.push(pending << 4);
    return new Uint8Array(bytes);
  }

  private readLiteralString(): Uint8Array {
    const start = this.pos;
    this.pos++;
    const bytes: number[] = [];
    let depth = 1;

    for (;;) {
      const c = this.byteAt(this.pos++);
      if (c === -1) throw new PdfParseError('Unterminated string', start);
      if (c === 0x29 && --depth === 0) break;
      if (c === 0x28) depth++;
      if (c !== 0x5c) {
        bytes.push(c);
        continue;
      }

      const esc = this.byteAt(this.pos++);
      if (esc === -1) throw new PdfParseError('Unterminated string', start);
      if (esc >= 0x30 && esc <= 0x37) {
        let value = esc - 0x30;
        for (let n = 0; n < 2 && this.byteAt(this.pos) >= 0x30 && this.byteAt(this.pos) <= 0x37; n++) {
          value = (value << 3) | (this.data[this.pos++] - 0x30);
        }
        bytes.push(value & 0xff);
      } else if (esc === 0x0d || esc === 0x0a) {
        // Line continuation
        if (esc === 0x0d && this.byteAt(this.pos) === 0x0a) this.pos++;
      } else {
        bytes.push(ESCAPES[esc] ?? esc);
      }
    }
    return new Uint8Array(bytes);
  }
}
