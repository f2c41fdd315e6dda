import { describe, it, expect } from 'vitest';
import {
  GraytoneError,
  PdfFunctionError,
  PdfParseError,
  PdfUnsupportedError,
  UndefinedColorspaceError,
  UndefinedPatternError,
  UndefinedResourceError,
  UndefinedShadingError,
  UndefinedXObjectError,
  UnknownColorTypeError,
  UnsupportedColorspaceError,
  UnsupportedEncodingParametersError,
} from '../../src/errors.js';

describe('GraytoneError', () => {
  it('is the base of every error', () => {
    for (const err of [
      new PdfParseError('test'),
      new PdfUnsupportedError('test'),
      new PdfFunctionError('test'),
      new UndefinedShadingError('Sh0'),
      new UnsupportedColorspaceError(2),
      new UnsupportedEncodingParametersError('DCTDecode'),
      new UnknownColorTypeError(null),
    ]) {
      expect(err).toBeInstanceOf(GraytoneError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it('names each class', () => {
    expect(new GraytoneError('test').name).toBe('GraytoneError');
    expect(new PdfParseError('test').name).toBe('PdfParseError');
    expect(new UndefinedPatternError('P0').name).toBe('UndefinedPatternError');
  });
});

describe('PdfParseError', () => {
  it('stores the byte offset when given', () => {
    expect(new PdfParseError('parse failed', 42).offset).toBe(42);
    expect(new PdfParseError('parse failed').offset).toBeUndefined();
  });
});

describe('UndefinedResourceError', () => {
  it('carries the resource type and name', () => {
    const cases: Array<[UndefinedResourceError, string]> = [
      [new UndefinedColorspaceError('CS0'), 'ColorSpace'],
      [new UndefinedPatternError('P0'), 'Pattern'],
      [new UndefinedShadingError('Sh0'), 'Shading'],
      [new UndefinedXObjectError('Im0'), 'XObject'],
    ];
    for (const [err, type] of cases) {
      expect(err).toBeInstanceOf(UndefinedResourceError);
      expect(err.resourceType).toBe(type);
    }
    expect(new UndefinedXObjectError('Im0').message).toBe('Undefined XObject resource /Im0');
    expect(new UndefinedShadingError('Sh0').resourceName).toBe('Sh0');
  });
});

describe('other errors', () => {
  it('reports the component count of an unsupported colorspace', () => {
    const err = new UnsupportedColorspaceError(5);
    expect(err.numComponents).toBe(5);
    expect(err.message).toBe('Unsupported colorspace with 5 components');
  });

  it('reports the filter that could not be written', () => {
    expect(new UnsupportedEncodingParametersError('JPXDecode').message).toBe('Cannot encode image with JPXDecode');
    expect(new UnsupportedEncodingParametersError('DCTDecode', 'no gray JPEG').message).toBe('no gray JPEG');
  });

  it('describes the unknown color type', () => {
    expect(new UnknownColorTypeError({ kind: 'Hexachrome' }).message).toBe('Unknown color type: Hexachrome');
    expect(new UnknownColorTypeError(7).message).toBe('Unknown color type: number');
  });
});
