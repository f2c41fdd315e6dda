import { describe, it, expect } from 'vitest';
import { isMarked, isTextEmpty, operatorMarking } from '../../src/detect/marking-detector.js';
import { parseContentStream } from '../../src/content/parser.js';
import { op, type ContentStream } from '../../src/content/operators.js';
import { MemoryResourceScope } from '../../src/resources/memory-scope.js';
import type { TilingPattern } from '../../src/resources/types.js';
import { DEVICE_GRAY, DEVICE_RGB } from '../../src/color/colorspace.js';
import { UndefinedPatternError, UndefinedXObjectError } from '../../src/errors.js';
import { pdfArray, pdfDict, pdfInlineImage, pdfNumber, pdfStringFromText } from '../../src/parser/types.js';

const content = (source: string): ContentStream => parseContentStream(new TextEncoder().encode(source));
const marked = (source: string, resources = new MemoryResourceScope()) => isMarked(content(source), resources);

const tiling = (source: string): TilingPattern => ({
  kind: 'tiling', content: content(source), resources: new MemoryResourceScope(), colored: true,
});

describe('operatorMarking', () => {
  it('knows which colors painting operators use', () => {
    expect(operatorMarking('f')).toEqual({ marks: true, usesStroke: false, usesFill: true });
    expect(operatorMarking('S')).toEqual({ marks: true, usesStroke: true, usesFill: false });
    expect(operatorMarking('B*')).toEqual({ marks: true, usesStroke: true, usesFill: true });
    expect(operatorMarking('EI')).toEqual({ marks: true, usesStroke: false, usesFill: false });
  });

  it('has no entry for operators that never mark', () => {
    expect(operatorMarking('re')).toBeUndefined();
    expect(operatorMarking('rg')).toBeUndefined();
    expect(operatorMarking('constructor')).toBeUndefined();
  });
});

describe('isTextEmpty', () => {
  it('treats spaces and control bytes as empty', () => {
    expect(isTextEmpty(op('Tj', pdfStringFromText(' \t\n')))).toBe(true);
    expect(isTextEmpty(op('Tj', pdfStringFromText(' a ')))).toBe(false);
  });

  it('reads the string operand of "', () => {
    expect(isTextEmpty(op('"', pdfNumber(1), pdfNumber(2), pdfStringFromText('  ')))).toBe(true);
    expect(isTextEmpty(op('"', pdfNumber(1), pdfNumber(2), pdfStringFromText('x')))).toBe(false);
  });

  it('ignores the kerning numbers of TJ', () => {
    expect(isTextEmpty(op('TJ', pdfArray([pdfStringFromText(' '), pdfNumber(-120)])))).toBe(true);
    expect(isTextEmpty(op('TJ', pdfArray([pdfNumber(-120), pdfStringFromText('W')])))).toBe(false);
  });

  it('is false for operators that show no text', () => {
    expect(isTextEmpty(op('f'))).toBe(false);
  });
});

describe('isMarked: paths and text', () => {
  it('counts text in the default black', () => {
    expect(marked('BT /F1 12 Tf (Hello) Tj ET')).toBe(true);
  });

  it('does not count white text', () => {
    expect(marked('1 g 1 G BT (Hello) Tj ET')).toBe(false);
  });

  it('does not count invisible text', () => {
    expect(marked('BT 3 Tr (Hello) Tj ET')).toBe(false);
    expect(marked('BT 7 Tr (Hello) Tj ET')).toBe(false);
    expect(marked('BT 2 Tr (Hello) Tj ET')).toBe(true);
  });

  it('does not count text without glyphs', () => {
    expect(marked('BT ( ) Tj [( ) -250] TJ ET')).toBe(false);
  });

  it('judges a fill by the fill color and a stroke by the stroke color', () => {
    expect(marked('1 g 0 0 1 1 re f')).toBe(false);
    expect(marked('1 g 0 0 1 1 re S')).toBe(true);
    expect(marked('1 G 0 0 1 1 re S')).toBe(false);
    expect(marked('1 G 0.5 0 0 rg 0 0 1 1 re B')).toBe(true);
  });

  it('needs a painting operator', () => {
    expect(marked('0 g 0 0 m 10 10 l 0 0 1 1 re n')).toBe(false);
  });

  it('follows the saved graphics state', () => {
    expect(marked('1 g 1 G q 0 g Q 0 0 1 1 re f')).toBe(false);
  });

  it('judges shadings by either current color', () => {
    expect(marked('1 g 1 G /Sh0 sh')).toBe(false);
    expect(marked('1 g /Sh0 sh')).toBe(true);
  });
});

describe('isMarked: images and forms', () => {
  it('always counts inline images', () => {
    const image = pdfInlineImage(pdfDict(new Map([['W', pdfNumber(1)], ['H', pdfNumber(1)]])), new Uint8Array([255]));
    expect(isMarked([op('g', pdfNumber(1)), op('G', pdfNumber(1)), op('BI', image)], new MemoryResourceScope())).toBe(true);
  });

  it('counts image XObjects without decoding them', () => {
    const resources = new MemoryResourceScope({
      xobjects: {
        Im0: {
          kind: 'image', width: 1, height: 1, colorspace: DEVICE_GRAY, bitsPerComponent: 8,
          filters: ['JBIG2Decode'], data: new Uint8Array(0),
        },
      },
    });
    expect(marked('1 g /Im0 Do', resources)).toBe(true);
  });

  it('judges forms by their content', () => {
    const resources = new MemoryResourceScope({
      xobjects: {
        Blank: { kind: 'form', content: content('1 g 0 0 10 10 re f') },
        Ink: { kind: 'form', content: content('0 0 10 10 re f') },
      },
    });
    expect(marked('/Blank Do', resources)).toBe(false);
    expect(marked('/Blank Do /Ink Do', resources)).toBe(true);
  });

  it('throws for an undefined XObject', () => {
    expect(() => marked('/Fm9 Do')).toThrow(UndefinedXObjectError);
  });
});

describe('isMarked: patterns', () => {
  const resources = new MemoryResourceScope({
    colorspaces: { CS0: { kind: 'Pattern', underlying: DEVICE_GRAY }, CS1: { kind: 'Pattern', underlying: DEVICE_RGB } },
    patterns: {
      White: tiling('1 g 0 0 1 1 re f'),
      Black: tiling('0 0 1 1 re f'),
      Ramp: { kind: 'shading', shading: { colorspace: DEVICE_GRAY } },
    },
  });

  it('judges tiling patterns by their content', () => {
    expect(marked('/Pattern cs /White scn 0 0 5 5 re f', resources)).toBe(false);
    expect(marked('/Pattern cs /Black scn 0 0 5 5 re f', resources)).toBe(true);
  });

  it('counts shading patterns', () => {
    expect(marked('/Pattern cs /Ramp scn 0 0 5 5 re f', resources)).toBe(true);
  });

  it('judges uncolored patterns by their underlying color', () => {
    expect(marked('/CS0 cs 1 /White scn 0 0 5 5 re f', resources)).toBe(false);
    expect(marked('/CS1 cs 1 1 0 /White scn 0 0 5 5 re f', resources)).toBe(true);
  });

  it('does not count a Pattern colorspace before a pattern is set', () => {
    expect(marked('/Pattern cs 0 0 5 5 re f', resources)).toBe(false);
  });

  it('throws for an undefined pattern', () => {
    expect(() => marked('/Pattern CS /P9 SCN 0 0 5 5 re S', resources)).toThrow(UndefinedPatternError);
  });
});
