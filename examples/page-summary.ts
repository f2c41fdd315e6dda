/**
 * Page summary example.
 * Builds three small pages in memory and prints which of them carry color
 * and which leave any mark at all.
 *
 * Usage:
 *   npx tsx examples/page-summary.ts
 */

import {
  DEVICE_RGB,
  MemoryResourceScope,
  parseContentStream,
  summarizePages,
  type PageInput,
} from '../src/index.js';

const letter = [0, 0, 612, 792];
const encoder = new TextEncoder();

const resources = new MemoryResourceScope({
  shadings: { Sh0: { colorspace: DEVICE_RGB } },
});

const pages: PageInput[] = [
  'BT /F1 12 Tf 72 720 Td (Black text) Tj ET',
  'q 0 0 1 RG 10 10 100 100 re S Q',
  'q 1 g 0 0 612 792 re f Q /Sh0 sh',
].map((source) => ({ content: parseContentStream(encoder.encode(source)), resources, mediaBox: letter }));

console.log(JSON.stringify(summarizePages(pages), null, 2));
console.log(JSON.stringify(summarizePages(pages, { mode: 'marking' }), null, 2));
