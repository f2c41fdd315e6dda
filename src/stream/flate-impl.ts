/**
 * Injectable Flate implementation.
 * Configured at module load time by the entry point (Node uses node:zlib, browser uses fflate).
 */

type FlateFn = (data: Uint8Array) => Uint8Array;

let inflateImpl: FlateFn | null = null;
let deflateImpl: FlateFn | null = null;

export function setInflate(fn: FlateFn): void {
  inflateImpl = fn;
}

export function setDeflate(fn: FlateFn): void {
  deflateImpl = fn;
}

export function inflate(data: Uint8Array): Uint8Array {
  if (!inflateImpl) throw new Error('No inflate implementation configured. Import from "graytone" or "graytone/browser".');
  return inflateImpl(data);
}

export function deflate(data: Uint8Array): Uint8Array {
  if (!deflateImpl) throw new Error('No deflate implementation configured. Import from "graytone" or "graytone/browser".');
  return deflateImpl(data);
}
