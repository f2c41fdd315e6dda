/**
 * Options and per-call state shared by the detectors.
 */

import { type ImageCodec, defaultImageCodec } from '../image/codec.js';
import type { ResourceScope } from '../resources/types.js';
import { DEFAULT_MAX_DEPTH, NestingGuard, VisitedSet, type MemoKind } from '../content/traversal.js';

export interface DetectOptions {
  /** Image codec used to decode image samples (default: the built-in codec) */
  codec?: ImageCodec;
  /** Deepest nesting of forms and tiling patterns that is followed (default: 32) */
  maxDepth?: number;
}

export interface DetectContext {
  readonly codec: ImageCodec;
  readonly memo: VisitedSet<boolean>;
  readonly guard: NestingGuard;
}

export function createDetectContext(options: DetectOptions = {}): DetectContext {
  return {
    codec: options.codec ?? defaultImageCodec,
    memo: new VisitedSet(),
    guard: new NestingGuard(options.maxDepth ?? DEFAULT_MAX_DEPTH),
  };
}

/** Look up a memoized result, computing and storing it on a miss */
export function memoized(
  ctx: DetectContext,
  scope: ResourceScope,
  kind: MemoKind,
  name: string,
  compute: () => boolean,
): boolean {
  const cached = ctx.memo.get(scope, kind, name);
  if (cached !== undefined) return cached;
  const result = compute();
  ctx.memo.set(scope, kind, name, result);
  return result;
}
