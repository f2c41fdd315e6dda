/**
 * State threaded through a traversal of nested content: per-call memoization
 * of named resources and the guard against self-referencing forms and patterns.
 */

import { getLogger } from '../logger.js';
import type { ResourceScope } from '../resources/types.js';
import type { ContentStream } from './operators.js';

export const DEFAULT_MAX_DEPTH = 32;

export type MemoKind = 'pattern' | 'shading' | 'xobject';

/**
 * Results already computed for named resources. Names are only meaningful
 * within their resource scope, so entries are keyed by scope as well.
 */
export class VisitedSet<T> {
  private readonly scopes = new WeakMap<ResourceScope, Map<string, T>>();

  get(scope: ResourceScope, kind: MemoKind, name: string): T | undefined {
    return this.scopes.get(scope)?.get(`${kind}:${name}`);
  }

  has(scope: ResourceScope, kind: MemoKind, name: string): boolean {
    return this.scopes.get(scope)?.has(`${kind}:${name}`) ?? false;
  }

  set(scope: ResourceScope, kind: MemoKind, name: string, value: T): void {
    let entries = this.scopes.get(scope);
    if (!entries) {
      entries = new Map();
      this.scopes.set(scope, entries);
    }
    entries.set(`${kind}:${name}`, value);
  }
}

/** Tracks the content streams currently being processed along the call chain. */
export class NestingGuard {
  private readonly active = new Set<ContentStream>();

  constructor(private readonly maxDepth: number = DEFAULT_MAX_DEPTH) {}

  get depth(): number {
    return this.active.size;
  }

  /**
   * Run `fn` with `content` marked active. Returns `skipped` instead when
   * `content` is already active or the nesting limit is reached.
   */
  enter<T>(content: ContentStream, label: string, fn: () => T, skipped: T): T {
    if (this.active.has(content)) {
      getLogger().warn(`Skipping ${label}: it is nested inside itself`);
      return skipped;
    }
    if (this.active.size >= this.maxDepth) {
      getLogger().warn(`Skipping ${label}: nesting deeper than ${this.maxDepth}`);
      return skipped;
    }
    this.active.add(content);
    try {
      return fn();
    } finally {
      this.active.delete(content);
    }
  }
}
