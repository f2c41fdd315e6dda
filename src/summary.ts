/**
 * Per-document summary: page count, largest page size and the pages that
 * contain color (or, in marking mode, any visible mark).
 */

import type { ContentStream } from './content/operators.js';
import type { ResourceScope } from './resources/types.js';
import { type DetectOptions } from './detect/context.js';
import { isColored } from './detect/color-detector.js';
import { isMarked } from './detect/marking-detector.js';

export interface PageInput {
  readonly content: ContentStream;
  readonly resources: ResourceScope;
  /** [llx lly urx ury] in points */
  readonly mediaBox?: readonly number[];
}

export interface SummaryOptions extends DetectOptions {
  /** 'color' lists pages with color, 'marking' pages with any visible mark (default: 'color') */
  mode?: 'color' | 'marking';
}

export interface PageSummary {
  readonly numPages: number;
  /** Largest page width, mm */
  readonly width: number;
  /** Largest page height, mm */
  readonly height: number;
  /** 1-based numbers of the pages with color (color mode) */
  readonly colorPages?: readonly number[];
  /** 1-based numbers of the pages with a visible mark (marking mode) */
  readonly markedPages?: readonly number[];
}

/** Points to millimetres, rounded to 0.1 mm */
export function toMM(points: number): number {
  return Math.round((Math.abs(points) / 72) * 25.4 * 10) / 10;
}

/**
 * Summarize `pages` in order. Pages are processed one after another, never
 * concurrently, since they may share resources.
 */
export function summarizePages(pages: readonly PageInput[], options: SummaryOptions = {}): PageSummary {
  const mode = options.mode ?? 'color';
  const detect = mode === 'color' ? isColored : isMarked;
  const found: number[] = [];
  let width = 0;
  let height = 0;

  pages.forEach((page, i) => {
    const [w, h] = pageSize(page.mediaBox);
    width = Math.max(width, w);
    height = Math.max(height, h);
    if (detect(page.content, page.resources, options)) found.push(i + 1);
  });

  const base = { numPages: pages.length, width, height };
  return mode === 'color' ? { ...base, colorPages: found } : { ...base, markedPages: found };
}

function pageSize(mediaBox: readonly number[] | undefined): [number, number] {
  if (!mediaBox || mediaBox.length < 4) return [0, 0];
  return [toMM(mediaBox[2] - mediaBox[0]), toMM(mediaBox[3] - mediaBox[1])];
}
