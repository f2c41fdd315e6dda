/**
 * Content Stream Writer
 *
 * Serializes operators back to content-stream bytes, one operator per line.
 * parseContentStream(serializeContentStream(ops)) yields operators equal to ops.
 */

import type { Operand, PdfDict, PdfInlineImage } from '../parser/types.js';
import { PdfUnsupportedError } from '../errors.js';
import type { ContentStream } from './operators.js';

export function serializeContentStream(stream: ContentStream): Uint8Array {
  const out = new ByteWriter();
  stream.forEach((operator, i) => {
    if (i > 0) out.text('\n');
    for (const operand of operator.operands) {
      if (operand.kind === 'inlineImage') continue;
      writeOperand(out, operand);
      out.text(' ');
    }
    const image = operator.name === 'BI' ? operator.operands.find(isInlineImage) : undefined;
    if (image) {
      writeInlineImage(out, image);
    } else {
      out.text(operator.name);
    }
  });
  return out.toBytes();
}

/** Serialize a single operand, as it would appear in a content stream */
export function serializeOperand(operand: Operand): string {
  const out = new ByteWriter();
  writeOperand(out, operand);
  return String.fromCharCode(...out.toBytes());
}

/** Format a number with at most six decimals and no trailing zeros */
export function formatNumber(n: number): string {
  if (Number.isInteger(n)) {
    return Object.is(n, -0) ? '0' : n.toString();
  }
  // Limit to 6 decimal places and remove trailing zeros
  const s = n.toFixed(6).replace(/\.?0+$/, '');
  return s === '-0' ? '0' : s;
}

function writeOperand(out: ByteWriter, operand: Operand): void {
  switch (operand.kind) {
    case 'number':
      out.text(formatNumber(operand.value));
      return;
    case 'name':
      out.text(escapeName(operand.value));
      return;
    case 'string':
      writeLiteralString(out, operand.value);
      return;
    case 'bool':
      out.text(operand.value ? 'true' : 'false');
      return;
    case 'null':
      out.text('null');
      return;
    case 'ref':
      out.text(`${operand.objNum} ${operand.gen} R`);
      return;
    case 'array':
      out.text('[');
      operand.items.forEach((item, i) => {
        if (i > 0) out.text(' ');
        writeOperand(out, item);
      });
      out.text(']');
      return;
    case 'dict':
      writeDict(out, operand);
      return;
    case 'inlineImage':
      writeInlineImage(out, operand);
      return;
    case 'stream':
      throw new PdfUnsupportedError('Streams cannot appear in a content stream');
  }
}

function writeDict(out: ByteWriter, dict: PdfDict): void {
  out.text('<<');
  for (const [key, value] of dict.entries) {
    out.text(escapeName(key));
    out.text(' ');
    writeOperand(out, value);
  }
  out.text('>>');
}

function writeInlineImage(out: ByteWriter, image: PdfInlineImage): void {
  out.text('BI');
  for (const [key, value] of image.dict.entries) {
    out.text(` ${escapeName(key)} `);
    writeOperand(out, value);
  }
  out.text(' ID ');
  out.bytes(image.data);
  out.text('\nEI');
}

function writeLiteralString(out: ByteWriter, value: Uint8Array): void {
  let s = '(';
  for (const b of value) {
    if (b === 0x28 || b === 0x29 || b === 0x5c) {
      s += '\\' + String.fromCharCode(b);
    } else if (b < 0x20 || b > 0x7e) {
      s += '\\' + b.toString(8).padStart(3, '0');
    } else {
      s += String.fromCharCode(b);
    }
  }
  out.text(s + ')');
}

function escapeName(name: string): string {
  let s = '/';
  for (let i = 0; i < name.length; i++) {
    const c = name.charCodeAt(i) & 0xff;
    if (c < 0x21 || c > 0x7e || c === 0x23 || NAME_DELIMITERS.has(c)) {
      s += '#' + c.toString(16).padStart(2, '0');
    } else {
      s += name[i];
    }
  }
  return s;
}

const NAME_DELIMITERS = new Set([0x28, 0x29, 0x3c, 0x3e, 0x5b, 0x5d, 0x7b, 0x7d, 0x2f, 0x25]);

function isInlineImage(operand: Operand): operand is PdfInlineImage {
  return operand.kind === 'inlineImage';
}

/** Accumulates text (as Latin-1) and raw bytes */
class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;

  text(s: string): void {
    const bytes = new Uint8Array(s.length);
    for (let i = 0; i < s.length; i++) bytes[i] = s.charCodeAt(i) & 0xff;
    this.bytes(bytes);
  }

  bytes(data: Uint8Array): void {
    this.chunks.push(data);
    this.size += data.length;
  }

  toBytes(): Uint8Array {
    const result = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}
