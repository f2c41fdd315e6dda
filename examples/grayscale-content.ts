/**
 * Grayscale a raw (decoded) content stream.
 * Reads the operators from a file, rewrites every color as gray and writes
 * the result next to the input.
 *
 * Usage:
 *   npx tsx examples/grayscale-content.ts path/to/content.txt
 */

import { readFile, writeFile } from 'node:fs/promises';
import {
  MemoryResourceScope,
  isColored,
  parseContentStream,
  serializeContentStream,
  toGrayscale,
} from '../src/index.js';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx examples/grayscale-content.ts <path-to-content-stream>');
  process.exit(1);
}

const stream = parseContentStream(new Uint8Array(await readFile(filePath)));
const resources = new MemoryResourceScope();

console.log(`Operators: ${stream.length}`);
console.log(`Colored: ${isColored(stream, resources)}`);

const gray = toGrayscale(stream, resources);
const outPath = `${filePath}.gray`;
await writeFile(outPath, serializeContentStream(gray));

console.log(`Colored after conversion: ${isColored(gray, resources)}`);
console.log(`Written to ${outPath}`);
