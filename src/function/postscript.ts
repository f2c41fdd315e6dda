/**
 * PostScript calculator (type 4 function) programs: parsing, evaluation and
 * writing back to text.
 *
 * A program is the body of the outer `{ ... }`; nested blocks are only
 * meaningful as operands of `if` and `ifelse`.
 */

import { ContentLexer } from '../parser/lexer.js';
import { PdfFunctionError } from '../errors.js';
import { formatNumber } from '../content/writer.js';

export type PsObject =
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'operator'; readonly name: string }
  | { readonly kind: 'block'; readonly body: PsProgram };

export type PsProgram = readonly PsObject[];

type PsValue = number | boolean | PsProgram;

const OPERATORS = new Set([
  // arithmetic
  'abs', 'add', 'atan', 'ceiling', 'cos', 'cvi', 'cvr', 'div', 'exp', 'floor', 'idiv', 'ln', 'log',
  'mod', 'mul', 'neg', 'round', 'sin', 'sqrt', 'sub', 'truncate',
  // relational, boolean, bitwise
  'and', 'bitshift', 'eq', 'ge', 'gt', 'le', 'lt', 'ne', 'not', 'or', 'xor',
  // conditional
  'if', 'ifelse',
  // stack
  'copy', 'dup', 'exch', 'index', 'pop', 'roll',
]);

export function parsePsProgram(source: Uint8Array | string): PsProgram {
  const data = typeof source === 'string' ? new TextEncoder().encode(source) : source;
  const lexer = new ContentLexer(data);
  const first = lexer.next();
  if (first.type !== 'delimiter' || first.value !== '{') {
    throw new PdfFunctionError('PostScript calculator program must start with {');
  }
  return readBlock(lexer);
}

function readBlock(lexer: ContentLexer): PsProgram {
  const body: PsObject[] = [];
  for (;;) {
    const token = lexer.next();
    switch (token.type) {
      case 'delimiter':
        if (token.value === '}') return body;
        if (token.value === '{') {
          body.push({ kind: 'block', body: readBlock(lexer) });
          break;
        }
        throw new PdfFunctionError(`Unexpected '${token.value}' in PostScript calculator program at ${token.offset}`);
      case 'number':
        body.push({ kind: 'number', value: token.value });
        break;
      case 'bool':
        body.push({ kind: 'bool', value: token.value });
        break;
      case 'keyword':
        if (!OPERATORS.has(token.value)) throw new PdfFunctionError(`Unknown PostScript operator: ${token.value}`);
        body.push({ kind: 'operator', name: token.value });
        break;
      case 'eof':
        throw new PdfFunctionError('Unterminated PostScript calculator program');
      default:
        throw new PdfFunctionError(`Unexpected token in PostScript calculator program at ${token.offset}`);
    }
  }
}

export function serializePsProgram(program: PsProgram): string {
  const parts = program.map((obj): string => {
    switch (obj.kind) {
      case 'number':
        return formatNumber(obj.value);
      case 'bool':
        return obj.value ? 'true' : 'false';
      case 'operator':
        return obj.name;
      case 'block':
        return serializePsProgram(obj.body);
    }
  });
  return parts.length > 0 ? `{ ${parts.join(' ')} }` : '{ }';
}

/** Run a program with the given inputs on the stack; returns the final stack as numbers. */
export function executePsProgram(program: PsProgram, inputs: readonly number[]): number[] {
  const stack: PsValue[] = [...inputs];
  run(program, stack);
  return stack.map((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'boolean') return v ? 1 : 0;
    throw new PdfFunctionError('PostScript program left a procedure on the stack');
  });
}

function run(program: PsProgram, stack: PsValue[]): void {
  for (const obj of program) {
    switch (obj.kind) {
      case 'number':
      case 'bool':
        stack.push(obj.value);
        break;
      case 'block':
        stack.push(obj.body);
        break;
      case 'operator':
        apply(obj.name, stack);
        break;
    }
  }
}

/** PostScript raises undefinedresult on a zero divisor */
function divisor(operator: string, value: number): number {
  if (value === 0) throw new PdfFunctionError(`undefinedresult: ${operator} by zero`);
  return value;
}

function apply(name: string, stack: PsValue[]): void {
  switch (name) {
    case 'abs': unary(stack, Math.abs); break;
    case 'neg': unary(stack, (x) => -x); break;
    case 'ceiling': unary(stack, Math.ceil); break;
    case 'floor': unary(stack, Math.floor); break;
    case 'round': unary(stack, (x) => Math.floor(x + 0.5)); break;
    case 'truncate': unary(stack, Math.trunc); break;
    case 'cvi': unary(stack, Math.trunc); break;
    case 'cvr': unary(stack, (x) => x); break;
    case 'sqrt': unary(stack, Math.sqrt); break;
    case 'sin': unary(stack, (x) => Math.sin((x * Math.PI) / 180)); break;
    case 'cos': unary(stack, (x) => Math.cos((x * Math.PI) / 180)); break;
    case 'ln': unary(stack, Math.log); break;
    case 'log': unary(stack, Math.log10); break;
    case 'add': binary(stack, (a, b) => a + b); break;
    case 'sub': binary(stack, (a, b) => a - b); break;
    case 'mul': binary(stack, (a, b) => a * b); break;
    case 'div': binary(stack, (a, b) => a / divisor(name, b)); break;
    case 'idiv': binary(stack, (a, b) => Math.trunc(Math.trunc(a) / divisor(name, Math.trunc(b)))); break;
    case 'mod': binary(stack, (a, b) => Math.trunc(a) % divisor(name, Math.trunc(b))); break;
    case 'exp': binary(stack, (a, b) => Math.pow(a, b)); break;
    case 'atan':
      binary(stack, (num, den) => {
        const deg = (Math.atan2(num, den) * 180) / Math.PI;
        return deg < 0 ? deg + 360 : deg;
      });
      break;
    case 'bitshift': binary(stack, (a, shift) => (shift >= 0 ? a << shift : a >> -shift)); break;
    case 'eq': compare(stack, (a, b) => a === b); break;
    case 'ne': compare(stack, (a, b) => a !== b); break;
    case 'gt': compare(stack, (a, b) => a > b); break;
    case 'ge': compare(stack, (a, b) => a >= b); break;
    case 'lt': compare(stack, (a, b) => a < b); break;
    case 'le': compare(stack, (a, b) => a <= b); break;
    case 'and': logical(stack, (a, b) => a && b, (a, b) => a & b); break;
    case 'or': logical(stack, (a, b) => a || b, (a, b) => a | b); break;
    case 'xor': logical(stack, (a, b) => a !== b, (a, b) => a ^ b); break;
    case 'not': {
      const v = pop(stack);
      if (typeof v === 'boolean') stack.push(!v);
      else if (typeof v === 'number') stack.push(~v);
      else throw new PdfFunctionError('not expects a boolean or integer');
      break;
    }
    case 'if': {
      const proc = popProc(stack);
      if (popBool(stack)) run(proc, stack);
      break;
    }
    case 'ifelse': {
      const elseProc = popProc(stack);
      const thenProc = popProc(stack);
      run(popBool(stack) ? thenProc : elseProc, stack);
      break;
    }
    case 'dup': {
      const v = pop(stack);
      stack.push(v, v);
      break;
    }
    case 'exch': {
      const b = pop(stack);
      const a = pop(stack);
      stack.push(b, a);
      break;
    }
    case 'pop':
      pop(stack);
      break;
    case 'copy': {
      const n = popNum(stack);
      if (n < 0 || n > stack.length) throw new PdfFunctionError('copy: range check');
      stack.push(...stack.slice(stack.length - n));
      break;
    }
    case 'index': {
      const n = popNum(stack);
      if (n < 0 || n >= stack.length) throw new PdfFunctionError('index: range check');
      stack.push(stack[stack.length - 1 - n]);
      break;
    }
    case 'roll': {
      const j = popNum(stack);
      const n = popNum(stack);
      if (n < 0 || n > stack.length) throw new PdfFunctionError('roll: range check');
      if (n === 0) break;
      const top = stack.splice(stack.length - n, n);
      const shift = ((j % n) + n) % n;
      stack.push(...top.slice(n - shift), ...top.slice(0, n - shift));
      break;
    }
    default:
      throw new PdfFunctionError(`Unknown PostScript operator: ${name}`);
  }
}

// ─── Stack helpers ───

function pop(stack: PsValue[]): PsValue {
  const v = stack.pop();
  if (v === undefined) throw new PdfFunctionError('PostScript stack underflow');
  return v;
}

function popNum(stack: PsValue[]): number {
  const v = pop(stack);
  if (typeof v !== 'number') throw new PdfFunctionError('Expected a number on the PostScript stack');
  return v;
}

function popBool(stack: PsValue[]): boolean {
  const v = pop(stack);
  if (typeof v !== 'boolean') throw new PdfFunctionError('Expected a boolean on the PostScript stack');
  return v;
}

function popProc(stack: PsValue[]): PsProgram {
  const v = pop(stack);
  if (typeof v === 'number' || typeof v === 'boolean') {
    throw new PdfFunctionError('Expected a procedure on the PostScript stack');
  }
  return v;
}

function unary(stack: PsValue[], fn: (x: number) => number): void {
  stack.push(fn(popNum(stack)));
}

function binary(stack: PsValue[], fn: (a: number, b: number) => number): void {
  const b = popNum(stack);
  const a = popNum(stack);
  stack.push(fn(a, b));
}

function compare(stack: PsValue[], fn: (a: number | boolean, b: number | boolean) => boolean): void {
  const b = pop(stack);
  const a = pop(stack);
  if (typeof a === 'object' || typeof b === 'object') {
    throw new PdfFunctionError('Cannot compare procedures');
  }
  stack.push(fn(a, b));
}

function logical(
  stack: PsValue[],
  onBool: (a: boolean, b: boolean) => boolean,
  onInt: (a: number, b: number) => number,
): void {
  const b = pop(stack);
  const a = pop(stack);
  if (typeof a === 'boolean' && typeof b === 'boolean') stack.push(onBool(a, b));
  else if (typeof a === 'number' && typeof b === 'number') stack.push(onInt(a, b));
  else throw new PdfFunctionError('Mismatched operand types for boolean operator');
}
