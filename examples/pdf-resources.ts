/**
 * Working on PDF resource dictionaries.
 * A resource dictionary with a colored tiling pattern is wrapped in a
 * PdfResourceScope; after conversion the dictionary holds the gray pattern.
 *
 * Usage:
 *   npx tsx examples/pdf-resources.ts
 */

import {
  PdfResourceScope,
  isColored,
  parseContentStream,
  pdfDict,
  pdfName,
  pdfNumber,
  pdfStream,
  toGrayscale,
  type PdfObject,
} from '../src/index.js';

const encoder = new TextEncoder();
const dict = (entries: Record<string, PdfObject>) => pdfDict(new Map(Object.entries(entries)));

const resourcesDict = dict({
  Pattern: dict({
    P0: pdfStream(
      dict({ PatternType: pdfNumber(1), PaintType: pdfNumber(1) }),
      encoder.encode('1 0 0 rg 0 0 5 5 re f 0 0 1 rg 5 5 5 5 re f'),
    ),
  }),
});

const stream = parseContentStream(encoder.encode('/Pattern cs /P0 scn 0 0 200 200 re f'));

console.log(`Colored: ${isColored(stream, new PdfResourceScope(resourcesDict))}`);
toGrayscale(stream, new PdfResourceScope(resourcesDict));
console.log(`Colored after conversion: ${isColored(stream, new PdfResourceScope(resourcesDict))}`);
