/**
 * In-memory resource scope.
 */

import type { Colorspace } from '../color/colorspace.js';
import type { Pattern, ResourceScope, Shading, XObject } from './types.js';

export interface MemoryResources {
  colorspaces?: Record<string, Colorspace>;
  patterns?: Record<string, Pattern>;
  shadings?: Record<string, Shading>;
  xobjects?: Record<string, XObject>;
}

export class MemoryResourceScope implements ResourceScope {
  private readonly colorspaces: Map<string, Colorspace>;
  private readonly patterns: Map<string, Pattern>;
  private readonly shadings: Map<string, Shading>;
  private readonly xobjects: Map<string, XObject>;

  constructor(resources: MemoryResources = {}, private readonly parent?: ResourceScope) {
    this.colorspaces = new Map(Object.entries(resources.colorspaces ?? {}));
    this.patterns = new Map(Object.entries(resources.patterns ?? {}));
    this.shadings = new Map(Object.entries(resources.shadings ?? {}));
    this.xobjects = new Map(Object.entries(resources.xobjects ?? {}));
  }

  getColorspace(name: string): Colorspace | undefined {
    return this.colorspaces.get(name) ?? this.parent?.getColorspace(name);
  }

  setColorspace(name: string, colorspace: Colorspace): void {
    this.colorspaces.set(name, colorspace);
  }

  getPattern(name: string): Pattern | undefined {
    return this.patterns.get(name) ?? this.parent?.getPattern(name);
  }

  setPattern(name: string, pattern: Pattern): void {
    this.patterns.set(name, pattern);
  }

  getShading(name: string): Shading | undefined {
    return this.shadings.get(name) ?? this.parent?.getShading(name);
  }

  setShading(name: string, shading: Shading): void {
    this.shadings.set(name, shading);
  }

  getXObject(name: string): XObject | undefined {
    return this.xobjects.get(name) ?? this.parent?.getXObject(name);
  }

  setXObject(name: string, xobject: XObject): void {
    this.xobjects.set(name, xobject);
  }
}
