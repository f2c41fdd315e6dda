/**
 * Content Stream Parser
 *
 * Turns raw (already decoded) content-stream bytes into a list of operators.
 * Operands are collected as PDF objects until an operator keyword is read;
 * BI ... ID ... EI is folded into a single BI operator carrying the image.
 */

import { ContentLexer, isWhitespace, type Token } from '../parser/lexer.js';
import type { Operand, PdfDict, PdfInlineImage, PdfObject } from '../parser/types.js';
import {
  PDF_NULL, pdfArray, pdfBool, pdfDict, pdfInlineImage, pdfName, pdfNumber, pdfRef, pdfString,
  dictGet, dictGetBool, dictGetNumber, isArray, isName, isNumber,
} from '../parser/types.js';
import { PdfParseError } from '../errors.js';
import type { ContentOperator } from './operators.js';

/** Pre-computed byte marker for inline image end detection */
const EI_MARKER = new Uint8Array([0x45, 0x49]); // 'EI'

export function parseContentStream(data: Uint8Array): ContentOperator[] {
  const lexer = new ContentLexer(data);
  const operators: ContentOperator[] = [];
  let operands: Operand[] = [];

  for (;;) {
    const token = lexer.next();

    if (token.type === 'eof') {
      if (operands.length > 0) {
        throw new PdfParseError('Operands without an operator at end of content stream', token.offset);
      }
      return operators;
    }

    if (token.type === 'keyword') {
      const name = token.value;
      operators.push({ name, operands: name === 'BI' ? [readInlineImage(lexer, token.offset)] : operands });
      operands = [];
    } else if (token.type === 'delimiter' && token.value !== '[' && token.value !== '<<') {
      throw new PdfParseError(`Unexpected '${token.value}' in content stream`, token.offset);
    } else {
      operands.push(readObject(lexer, token));
    }
  }
}

/** Read one direct object starting at the given token */
function readObject(lexer: ContentLexer, token: Token): PdfObject {
  switch (token.type) {
    case 'number':
      return pdfNumber(token.value);
    case 'string':
      return pdfString(token.value);
    case 'name':
      return pdfName(token.value);
    case 'bool':
      return pdfBool(token.value);
    case 'null':
      return PDF_NULL;
    case 'delimiter':
      if (token.value === '[') return readArray(lexer, token.offset);
      if (token.value === '<<') return readDict(lexer, token.offset);
      throw new PdfParseError(`Unexpected '${token.value}' where an operand was expected`, token.offset);
    case 'keyword':
      throw new PdfParseError(`Unexpected '${token.value}' where an operand was expected`, token.offset);
    case 'eof':
      throw new PdfParseError('Unexpected end of content stream', token.offset);
  }
}

function readArray(lexer: ContentLexer, start: number): PdfObject {
  const items: PdfObject[] = [];
  for (;;) {
    const token = lexer.next();
    if (token.type === 'delimiter' && token.value === ']') return pdfArray(items);
    if (token.type === 'eof') throw new PdfParseError('Unterminated array', start);

    // "n g R" inside an array
    if (token.type === 'keyword' && token.value === 'R' && items.length >= 2) {
      const gen = items[items.length - 1];
      const num = items[items.length - 2];
      if (isNumber(num) && isNumber(gen)) {
        items.splice(items.length - 2, 2, pdfRef(num.value, gen.value));
        continue;
      }
    }
    items.push(readObject(lexer, token));
  }
}

function readDict(lexer: ContentLexer, start: number): PdfDict {
  const entries = new Map<string, PdfObject>();
  for (;;) {
    const key = lexer.next();
    if (key.type === 'delimiter' && key.value === '>>') return pdfDict(entries);
    if (key.type === 'eof') throw new PdfParseError('Unterminated dictionary', start);
    if (key.type !== 'name') throw new PdfParseError('Dictionary key must be a name', key.offset);

    const value = lexer.next();
    if ((value.type === 'delimiter' && value.value === '>>') || value.type === 'eof') {
      throw new PdfParseError(`Missing value for /${key.value}`, value.offset);
    }
    entries.set(key.value, readObject(lexer, value));
  }
}

function readInlineImage(lexer: ContentLexer, start: number): PdfInlineImage {
  const entries = new Map<string, PdfObject>();
  for (;;) {
    const key = lexer.next();
    if (key.type === 'keyword' && key.value === 'ID') break;
    if (key.type === 'eof') throw new PdfParseError('Unterminated inline image', start);
    if (key.type !== 'name') throw new PdfParseError('Inline image key must be a name', key.offset);
    entries.set(key.value, readObject(lexer, lexer.next()));
  }
  const dict = pdfDict(entries);

  // A single whitespace byte separates ID from the data
  if (isWhitespace(lexer.byteAt(lexer.position))) lexer.position++;
  const dataStart = lexer.position;

  const expected = unfilteredLength(dict);
  if (expected !== null && dataStart + expected <= lexer.length) {
    let after = dataStart + expected;
    while (isWhitespace(lexer.byteAt(after))) after++;
    if (lexer.indexOf(EI_MARKER, after) === after) {
      lexer.position = after + 2;
      return pdfInlineImage(dict, lexer.slice(dataStart, dataStart + expected));
    }
  }

  // Otherwise the data ends at the first EI with whitespace on both sides
  for (let pos = lexer.indexOf(EI_MARKER, dataStart); pos !== -1; pos = lexer.indexOf(EI_MARKER, pos + 1)) {
    const before = pos > dataStart ? lexer.byteAt(pos - 1) : 0x20;
    const after = lexer.byteAt(pos + 2);
    if (isWhitespace(before) && (after === -1 || isWhitespace(after))) {
      lexer.position = pos + 2;
      return pdfInlineImage(dict, lexer.slice(dataStart, Math.max(dataStart, pos - 1)));
    }
  }

  throw new PdfParseError('Inline image data is not terminated by EI', start);
}

/** Byte length of unfiltered inline image data, when it can be computed from the dictionary */
function unfilteredLength(dict: PdfDict): number | null {
  if (dictGet(dict, 'F') ?? dictGet(dict, 'Filter')) return null;
  const width = dictGetNumber(dict, 'W') ?? dictGetNumber(dict, 'Width');
  const height = dictGetNumber(dict, 'H') ?? dictGetNumber(dict, 'Height');
  if (width === undefined || height === undefined) return null;

  let bpc = dictGetNumber(dict, 'BPC') ?? dictGetNumber(dict, 'BitsPerComponent') ?? 8;
  let comps: number | null;
  if (dictGetBool(dict, 'IM') ?? dictGetBool(dict, 'ImageMask')) {
    bpc = 1;
    comps = 1;
  } else {
    comps = inlineColorComponents(dictGet(dict, 'CS') ?? dictGet(dict, 'ColorSpace'));
  }
  if (comps === null) return null;
  return Math.ceil((width * comps * bpc) / 8) * height;
}

function inlineColorComponents(cs: PdfObject | undefined): number | null {
  if (!cs) return null;
  let family: string | undefined;
  if (isName(cs)) {
    family = cs.value;
  } else if (isArray(cs) && cs.items.length > 0) {
    const first = cs.items[0];
    if (isName(first)) family = first.value;
  }

  switch (family) {
    case 'G': case 'DeviceGray': case 'CalGray': case 'I': case 'Indexed':
      return 1;
    case 'RGB': case 'DeviceRGB': case 'CalRGB': case 'Lab':
      return 3;
    case 'CMYK': case 'DeviceCMYK':
      return 4;
    default:
      return null;
  }
}
