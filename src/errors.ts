/**
 * Custom error types for graytone.
 * Every error the library throws derives from GraytoneError.
 */

export class GraytoneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraytoneError';
  }
}

export class PdfParseError extends GraytoneError {
  constructor(message: string, public readonly offset?: number) {
    super(message);
    this.name = 'PdfParseError';
  }
}

export class PdfUnsupportedError extends GraytoneError {
  constructor(message: string) {
    super(message);
    this.name = 'PdfUnsupportedError';
  }
}

export type ResourceType = 'ColorSpace' | 'Pattern' | 'Shading' | 'XObject';

/** A content stream named a resource its scope does not define. */
export abstract class UndefinedResourceError extends GraytoneError {
  constructor(
    public readonly resourceType: ResourceType,
    public readonly resourceName: string,
  ) {
    super(`Undefined ${resourceType} resource /${resourceName}`);
    this.name = 'UndefinedResourceError';
  }
}

export class UndefinedColorspaceError extends UndefinedResourceError {
  constructor(resourceName: string) {
    super('ColorSpace', resourceName);
    this.name = 'UndefinedColorspaceError';
  }
}

export class UndefinedPatternError extends UndefinedResourceError {
  constructor(resourceName: string) {
    super('Pattern', resourceName);
    this.name = 'UndefinedPatternError';
  }
}

export class UndefinedShadingError extends UndefinedResourceError {
  constructor(resourceName: string) {
    super('Shading', resourceName);
    this.name = 'UndefinedShadingError';
  }
}

export class UndefinedXObjectError extends UndefinedResourceError {
  constructor(resourceName: string) {
    super('XObject', resourceName);
    this.name = 'UndefinedXObjectError';
  }
}

export class UnsupportedColorspaceError extends GraytoneError {
  constructor(public readonly numComponents: number) {
    super(`Unsupported colorspace with ${numComponents} components`);
    this.name = 'UnsupportedColorspaceError';
  }
}

export class UnsupportedEncodingParametersError extends GraytoneError {
  constructor(public readonly filter: string, message?: string) {
    super(message ?? `Cannot encode image with ${filter}`);
    this.name = 'UnsupportedEncodingParametersError';
  }
}

/**
 * A color or colorspace outside the supported set reached a predicate.
 * Indicates a programming error in the caller, not bad input.
 */
export class UnknownColorTypeError extends GraytoneError {
  constructor(public readonly value: unknown) {
    super(`Unknown color type: ${describe(value)}`);
    this.name = 'UnknownColorTypeError';
  }
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}

/** A PDF function could not be parsed or evaluated (bad program, stack underflow). */
export class PdfFunctionError extends GraytoneError {
  constructor(message: string) {
    super(message);
    this.name = 'PdfFunctionError';
  }
}
