/**
 * Content stream operators and operand accessors.
 */

import type { Operand, PdfInlineImage, PdfObject } from '../parser/types.js';
import { PdfParseError } from '../errors.js';

/** One operator with its preceding operands, e.g. `1 0 0 RG` */
export interface ContentOperator {
  readonly name: string;
  readonly operands: readonly Operand[];
}

/** A parsed content stream, in source order */
export type ContentStream = readonly ContentOperator[];

export function op(name: string, ...operands: Operand[]): ContentOperator {
  return { name, operands };
}

export function getNum(operands: readonly Operand[], idx: number): number | null {
  const o = operands[idx];
  return o && o.kind === 'number' ? o.value : null;
}

export function getName(operands: readonly Operand[], idx: number): string | null {
  const o = operands[idx];
  return o && o.kind === 'name' ? o.value : null;
}

export function getStr(operands: readonly Operand[], idx: number): Uint8Array | null {
  const o = operands[idx];
  return o && o.kind === 'string' ? o.value : null;
}

export function getArr(operands: readonly Operand[], idx: number): PdfObject[] | null {
  const o = operands[idx];
  return o && o.kind === 'array' ? o.items : null;
}

export function getInlineImage(operands: readonly Operand[], idx: number): PdfInlineImage | null {
  const o = operands[idx];
  return o && o.kind === 'inlineImage' ? o : null;
}

/** All operands as numbers, or null when any operand is not a number */
export function getNums(operands: readonly Operand[]): number[] | null {
  const values: number[] = [];
  for (const o of operands) {
    if (o.kind !== 'number') return null;
    values.push(o.value);
  }
  return values;
}

/** The resource name operand of `Do`, `sh` and friends */
export function resourceName(op: ContentOperator): string {
  const name = getName(op.operands, 0);
  if (name === null) throw new PdfParseError(`${op.name} expects a resource name`);
  return name;
}
