/**
 * graytone - detect color and visible marks in PDF content streams, and
 * rewrite them to grayscale
 *
 * @example
 * ```typescript
 * import { MemoryResourceScope, isColored, parseContentStream, toGrayscale } from 'graytone';
 *
 * const content = parseContentStream(new TextEncoder().encode('1 0 0 rg 0 0 10 10 re f'));
 * const resources = new MemoryResourceScope();
 *
 * isColored(content, resources);   // true
 * toGrayscale(content, resources); // [g 0.3, re, f]
 * ```
 */

import { deflateSync, inflateSync } from 'node:zlib';
import { setDeflate, setInflate } from './stream/flate-impl.js';

function nodeInflate(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(inflateSync(data));
  } catch {
    return new Uint8Array(inflateSync(data, { finishFlush: 0 }));
  }
}

setInflate(nodeInflate);
setDeflate((data) => new Uint8Array(deflateSync(data)));

export * from './api.js';
