/**
 * PDF functions (sampled, exponential, stitching, PostScript calculator).
 * Used as tint transforms of Separation/DeviceN colorspaces, including the
 * derived colorspaces built for grayscale shadings.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import {
  pdfArray, pdfDict, pdfNumber, pdfStream,
  dictGet, dictGetNumber, isArray, isDict, isNumber, isStream,
} from '../parser/types.js';
import { decodeStream, type ResolveFn } from '../stream/decoder.js';
import { PdfFunctionError, PdfUnsupportedError } from '../errors.js';
import { executePsProgram, parsePsProgram, serializePsProgram, type PsProgram } from './postscript.js';

export interface SampledFunction {
  readonly type: 0;
  readonly domain: readonly number[];
  readonly range: readonly number[];
  readonly size: readonly number[];
  readonly bitsPerSample: number;
  readonly encode: readonly number[];
  readonly decode: readonly number[];
  /** Raw sample values, first input varying fastest */
  readonly samples: readonly number[];
}

export interface ExponentialFunction {
  readonly type: 2;
  readonly domain: readonly number[];
  readonly range?: readonly number[];
  readonly c0: readonly number[];
  readonly c1: readonly number[];
  readonly n: number;
}

export interface StitchingFunction {
  readonly type: 3;
  readonly domain: readonly number[];
  readonly range?: readonly number[];
  readonly functions: readonly PdfFunction[];
  readonly bounds: readonly number[];
  readonly encode: readonly number[];
}

export interface CalculatorFunction {
  readonly type: 4;
  readonly domain: readonly number[];
  readonly range: readonly number[];
  readonly program: PsProgram;
}

export type PdfFunction = SampledFunction | ExponentialFunction | StitchingFunction | CalculatorFunction;

export function evaluateFunction(fn: PdfFunction, inputs: readonly number[]): number[] {
  const outputs = evaluateUnclipped(fn, clipToPairs(inputs, fn.domain));
  return fn.range ? clipToPairs(outputs, fn.range) : outputs;
}

function evaluateUnclipped(fn: PdfFunction, inputs: number[]): number[] {
  switch (fn.type) {
    case 0:
      return evaluateSampled(fn, inputs);
    case 2: {
      const x = inputs[0] ?? 0;
      return fn.c0.map((c0, i) => c0 + Math.pow(x, fn.n) * ((fn.c1[i] ?? 1) - c0));
    }
    case 3:
      return evaluateStitching(fn, inputs[0] ?? 0);
    case 4:
      return executePsProgram(fn.program, inputs);
  }
}

/** Number of outputs, when it can be told from the definition */
export function functionOutputCount(fn: PdfFunction): number {
  if (fn.range) return fn.range.length / 2;
  if (fn.type === 2) return fn.c0.length;
  if (fn.type === 3 && fn.functions.length > 0) return functionOutputCount(fn.functions[0]);
  return 1;
}

function evaluateStitching(fn: StitchingFunction, x: number): number[] {
  const k = fn.functions.length;
  let i = 0;
  while (i < fn.bounds.length && x >= fn.bounds[i]) i++;
  const lo = i === 0 ? fn.domain[0] : fn.bounds[i - 1];
  const hi = i === k - 1 ? fn.domain[1] : fn.bounds[i];
  const e0 = fn.encode[2 * i] ?? 0;
  const e1 = fn.encode[2 * i + 1] ?? 1;
  const t = hi === lo ? e0 : e0 + ((x - lo) * (e1 - e0)) / (hi - lo);
  const sub = fn.functions[Math.min(i, k - 1)];
  if (!sub) throw new PdfFunctionError('Stitching function has no subfunctions');
  return evaluateFunction(sub, [t]);
}

function evaluateSampled(fn: SampledFunction, inputs: readonly number[]): number[] {
  const m = fn.size.length;
  const n = fn.range.length / 2;
  const maxSample = Math.pow(2, fn.bitsPerSample) - 1;

  // Position of each input in sample space
  const lower: number[] = [];
  const frac: number[] = [];
  for (let i = 0; i < m; i++) {
    const d0 = fn.domain[2 * i];
    const d1 = fn.domain[2 * i + 1];
    const e = interpolate(inputs[i] ?? d0, d0, d1, fn.encode[2 * i], fn.encode[2 * i + 1]);
    const pos = Math.min(Math.max(e, 0), fn.size[i] - 1);
    lower.push(Math.floor(pos));
    frac.push(pos - Math.floor(pos));
  }

  // Multilinear interpolation over the 2^m corners
  const outputs = new Array<number>(n).fill(0);
  for (let corner = 0; corner < 1 << m; corner++) {
    let weight = 1;
    let index = 0;
    let stride = 1;
    for (let i = 0; i < m; i++) {
      const upper = (corner >> i) & 1;
      weight *= upper ? frac[i] : 1 - frac[i];
      index += Math.min(lower[i] + upper, fn.size[i] - 1) * stride;
      stride *= fn.size[i];
    }
    if (weight === 0) continue;
    for (let j = 0; j < n; j++) outputs[j] += weight * (fn.samples[index * n + j] ?? 0);
  }

  return outputs.map((s, j) => interpolate(s, 0, maxSample, fn.decode[2 * j], fn.decode[2 * j + 1]));
}

// ─── Reading and writing PDF objects ───

export function parseFunction(obj: PdfObject, resolve?: ResolveFn): PdfFunction {
  const resolved = resolve ? resolve(obj) : obj;
  const dict = isStream(resolved) ? resolved.dict : isDict(resolved) ? resolved : undefined;
  if (!dict) throw new PdfFunctionError('Function must be a dictionary or stream');

  const type = dictGetNumber(dict, 'FunctionType');
  const domain = numbers(dict, 'Domain', resolve) ?? [0, 1];
  const range = numbers(dict, 'Range', resolve);

  switch (type) {
    case 0: {
      if (!isStream(resolved) || !range) throw new PdfFunctionError('Sampled function needs a stream and /Range');
      const size = numbers(dict, 'Size', resolve);
      if (!size) throw new PdfFunctionError('Sampled function needs /Size');
      const bitsPerSample = dictGetNumber(dict, 'BitsPerSample') ?? 8;
      const data = decodeStream(resolved.data, dict, resolve);
      const count = size.reduce((a, b) => a * b, 1) * (range.length / 2);
      return {
        type: 0,
        domain,
        range,
        size,
        bitsPerSample,
        encode: numbers(dict, 'Encode', resolve) ?? size.flatMap((s) => [0, s - 1]),
        decode: numbers(dict, 'Decode', resolve) ?? range,
        samples: unpackSamples(data, bitsPerSample, count),
      };
    }
    case 2:
      return {
        type: 2,
        domain,
        range,
        c0: numbers(dict, 'C0', resolve) ?? [0],
        c1: numbers(dict, 'C1', resolve) ?? [1],
        n: dictGetNumber(dict, 'N') ?? 1,
      };
    case 3: {
      const fnsObj = dictGet(dict, 'Functions');
      const fns = fnsObj && resolve ? resolve(fnsObj) : fnsObj;
      if (!fns || !isArray(fns)) throw new PdfFunctionError('Stitching function needs /Functions');
      return {
        type: 3,
        domain,
        range,
        functions: fns.items.map((f) => parseFunction(f, resolve)),
        bounds: numbers(dict, 'Bounds', resolve) ?? [],
        encode: numbers(dict, 'Encode', resolve) ?? [],
      };
    }
    case 4: {
      if (!isStream(resolved) || !range) throw new PdfFunctionError('Calculator function needs a stream and /Range');
      return { type: 4, domain, range, program: parsePsProgram(decodeStream(resolved.data, dict, resolve)) };
    }
    default:
      throw new PdfUnsupportedError(`Unsupported function type ${String(type)}`);
  }
}

export function functionToPdfObject(fn: PdfFunction): PdfObject {
  const entries = new Map<string, PdfObject>([
    ['FunctionType', pdfNumber(fn.type)],
    ['Domain', numberArray(fn.domain)],
  ]);
  if (fn.range) entries.set('Range', numberArray(fn.range));

  switch (fn.type) {
    case 0: {
      entries.set('Size', numberArray(fn.size));
      entries.set('BitsPerSample', pdfNumber(fn.bitsPerSample));
      entries.set('Encode', numberArray(fn.encode));
      entries.set('Decode', numberArray(fn.decode));
      const data = packSamples(fn.samples, fn.bitsPerSample);
      entries.set('Length', pdfNumber(data.length));
      return pdfStream(pdfDict(entries), data);
    }
    case 2:
      entries.set('C0', numberArray(fn.c0));
      entries.set('C1', numberArray(fn.c1));
      entries.set('N', pdfNumber(fn.n));
      return pdfDict(entries);
    case 3:
      entries.set('Functions', pdfArray(fn.functions.map(functionToPdfObject)));
      entries.set('Bounds', numberArray(fn.bounds));
      entries.set('Encode', numberArray(fn.encode));
      return pdfDict(entries);
    case 4: {
      const data = new TextEncoder().encode(serializePsProgram(fn.program));
      entries.set('Length', pdfNumber(data.length));
      return pdfStream(pdfDict(entries), data);
    }
  }
}

// ─── Helpers ───

function numbers(dict: PdfDict, key: string, resolve?: ResolveFn): number[] | undefined {
  let obj = dictGet(dict, key);
  if (obj && resolve) obj = resolve(obj);
  if (!obj || !isArray(obj)) return undefined;
  const values: number[] = [];
  for (const item of obj.items) {
    const v = resolve ? resolve(item) : item;
    if (!isNumber(v)) return undefined;
    values.push(v.value);
  }
  return values;
}

function numberArray(values: readonly number[]): PdfObject {
  return pdfArray(values.map(pdfNumber));
}

function clipToPairs(values: readonly number[], bounds: readonly number[]): number[] {
  return values.map((v, i) => {
    const lo = bounds[2 * i];
    const hi = bounds[2 * i + 1];
    if (lo === undefined || hi === undefined) return v;
    return Math.min(Math.max(v, lo), hi);
  });
}

function interpolate(x: number, xmin: number, xmax: number, ymin: number, ymax: number): number {
  if (xmax === xmin) return ymin;
  return ymin + ((x - xmin) * (ymax - ymin)) / (xmax - xmin);
}

function unpackSamples(data: Uint8Array, bits: number, count: number): number[] {
  const samples: number[] = [];
  let bitPos = 0;
  for (let i = 0; i < count; i++) {
    let value = 0;
    for (let b = 0; b < bits; b++) {
      const byte = data[(bitPos + b) >> 3] ?? 0;
      value = value * 2 + ((byte >> (7 - ((bitPos + b) & 7))) & 1);
    }
    bitPos += bits;
    samples.push(value);
  }
  return samples;
}

function packSamples(samples: readonly number[], bits: number): Uint8Array {
  const out = new Uint8Array(Math.ceil((samples.length * bits) / 8));
  let bitPos = 0;
  for (const sample of samples) {
    for (let b = bits - 1; b >= 0; b--) {
      if (Math.floor(sample / Math.pow(2, b)) % 2 === 1) {
        out[bitPos >> 3] |= 0x80 >> (bitPos & 7);
      }
      bitPos++;
    }
  }
  return out;
}
