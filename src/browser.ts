/**
 * graytone/browser - the same API without Node built-ins
 *
 * Uses fflate for Flate streams instead of node:zlib.
 *
 * @example
 * ```typescript
 * import { PdfResourceScope, isMarked, parseContentStream } from 'graytone/browser';
 *
 * const marked = isMarked(parseContentStream(pageBytes), new PdfResourceScope(resourcesDict, resolver));
 * ```
 */

import { decompressSync, zlibSync } from 'fflate';
import { setDeflate, setInflate } from './stream/flate-impl.js';

setInflate((data) => decompressSync(data));
setDeflate((data) => zlibSync(data));

export * from './api.js';
