import { describe, it, expect } from 'vitest';
import { executePsProgram, parsePsProgram, serializePsProgram } from '../../src/function/postscript.js';
import {
  evaluateFunction, functionOutputCount, functionToPdfObject, parseFunction, type PdfFunction,
} from '../../src/function/pdf-function.js';
import { CMYK_TO_GRAY_PROGRAM, RGB_TO_GRAY_PROGRAM } from '../../src/transform/shading.js';
import { PdfFunctionError, PdfUnsupportedError } from '../../src/errors.js';
import { pdfArray, pdfDict, pdfNumber, pdfStream, type PdfObject } from '../../src/parser/types.js';

const run = (source: string, inputs: number[]) => executePsProgram(parsePsProgram(source), inputs);

describe('PostScript calculator', () => {
  it('runs arithmetic', () => {
    expect(run('{ 2 mul 1 sub }', [0.75])).toEqual([0.5]);
  });

  it('runs stack operators', () => {
    expect(run('{ 3 1 roll }', [1, 2, 3])).toEqual([3, 1, 2]);
    expect(run('{ 2 index }', [1, 2, 3])).toEqual([1, 2, 3, 1]);
    expect(run('{ 2 copy }', [1, 2])).toEqual([1, 2, 1, 2]);
    expect(run('{ exch pop }', [1, 2])).toEqual([2]);
  });

  it('runs conditionals', () => {
    const program = '{ dup 0.5 lt { pop 0 } { pop 1 } ifelse }';
    expect(run(program, [0.2])).toEqual([0]);
    expect(run(program, [0.7])).toEqual([1]);
  });

  it('computes gray from RGB with luma weights', () => {
    expect(run(RGB_TO_GRAY_PROGRAM, [1, 0, 0])[0]).toBeCloseTo(0.3, 10);
    expect(run(RGB_TO_GRAY_PROGRAM, [0, 0, 1])[0]).toBeCloseTo(0.11, 10);
  });

  it('computes CMYK coverage capped at 1', () => {
    expect(run(CMYK_TO_GRAY_PROGRAM, [0, 0, 0, 0.5])[0]).toBeCloseTo(0.5, 10);
    expect(run(CMYK_TO_GRAY_PROGRAM, [1, 0, 0, 0])[0]).toBeCloseTo(0.3, 10);
    expect(run(CMYK_TO_GRAY_PROGRAM, [1, 1, 1, 1])).toEqual([1]);
  });

  it('throws on stack underflow', () => {
    expect(() => run('{ add }', [1])).toThrow(PdfFunctionError);
  });

  it('throws on division by zero', () => {
    expect(() => run('{ 0 div }', [1])).toThrow(PdfFunctionError);
    expect(() => run('{ 0.5 idiv }', [7])).toThrow(PdfFunctionError);
    expect(() => run('{ 0 mod }', [7])).toThrow(PdfFunctionError);
    expect(run('{ 2 idiv }', [7])).toEqual([3]);
  });

  it('rejects unknown operators and unterminated programs', () => {
    expect(() => parsePsProgram('{ 1 frob }')).toThrow(PdfFunctionError);
    expect(() => parsePsProgram('{ 1 2 add')).toThrow(PdfFunctionError);
    expect(() => parsePsProgram('1 2 add }')).toThrow(PdfFunctionError);
  });

  it('writes programs back to text', () => {
    expect(serializePsProgram(parsePsProgram('{1 {pop 1} if}'))).toBe('{ 1 { pop 1 } if }');
  });
});

describe('evaluateFunction', () => {
  const doubler: PdfFunction = { type: 4, domain: [0, 1], range: [0, 1], program: parsePsProgram('{ 2 mul }') };

  it('clips inputs to the domain and outputs to the range', () => {
    expect(evaluateFunction(doubler, [0.25])).toEqual([0.5]);
    expect(evaluateFunction(doubler, [0.8])).toEqual([1]);
    expect(evaluateFunction(doubler, [-3])).toEqual([0]);
  });

  it('evaluates exponential functions', () => {
    const fn: PdfFunction = { type: 2, domain: [0, 1], c0: [0, 1], c1: [1, 0], n: 2 };
    expect(evaluateFunction(fn, [0.5])).toEqual([0.25, 0.75]);
    expect(functionOutputCount(fn)).toBe(2);
  });

  it('evaluates stitching functions piece by piece', () => {
    const fn: PdfFunction = {
      type: 3,
      domain: [0, 1],
      functions: [
        { type: 2, domain: [0, 1], c0: [0], c1: [1], n: 1 },
        { type: 2, domain: [0, 1], c0: [1], c1: [0], n: 1 },
      ],
      bounds: [0.5],
      encode: [0, 1, 0, 1],
    };
    expect(evaluateFunction(fn, [0.25])[0]).toBeCloseTo(0.5, 10);
    expect(evaluateFunction(fn, [0.6])[0]).toBeCloseTo(0.8, 10);
  });
});

describe('parseFunction', () => {
  const dict = (entries: Array<[string, PdfObject]>) => pdfDict(new Map(entries));
  const nums = (...values: number[]) => pdfArray(values.map(pdfNumber));

  it('reads and interpolates a sampled function', () => {
    const fn = parseFunction(pdfStream(dict([
      ['FunctionType', pdfNumber(0)],
      ['Domain', nums(0, 1)],
      ['Range', nums(0, 1)],
      ['Size', nums(2)],
      ['BitsPerSample', pdfNumber(8)],
    ]), new Uint8Array([0, 255])));
    expect(evaluateFunction(fn, [0.5])).toEqual([0.5]);
  });

  it('reads a calculator function written by functionToPdfObject', () => {
    const fn = parseFunction(functionToPdfObject({
      type: 4, domain: [0, 1, 0, 1, 0, 1], range: [0, 1], program: parsePsProgram(RGB_TO_GRAY_PROGRAM),
    }));
    expect(fn.type).toBe(4);
    expect(evaluateFunction(fn, [0, 1, 0])[0]).toBeCloseTo(0.59, 10);
  });

  it('requires a stream for calculator functions', () => {
    expect(() => parseFunction(dict([['FunctionType', pdfNumber(4)], ['Range', nums(0, 1)]])))
      .toThrow(PdfFunctionError);
  });

  it('rejects unknown function types', () => {
    expect(() => parseFunction(dict([['FunctionType', pdfNumber(1)]]))).toThrow(PdfUnsupportedError);
  });
});
