import { describe, it, expect, afterEach } from 'vitest';
import { isColored, isPatternColored, isShadingColored } from '../../src/detect/color-detector.js';
import { parseContentStream } from '../../src/content/parser.js';
import { op, type ContentStream } from '../../src/content/operators.js';
import { MemoryResourceScope } from '../../src/resources/memory-scope.js';
import type { ImageXObject, Pattern, Shading, TilingPattern } from '../../src/resources/types.js';
import { DEVICE_CMYK, DEVICE_GRAY, DEVICE_RGB, type SpotSpace } from '../../src/color/colorspace.js';
import { setLogger, type Logger } from '../../src/logger.js';
import {
  UndefinedPatternError, UndefinedShadingError, UndefinedXObjectError, UnsupportedColorspaceError,
} from '../../src/errors.js';
import { pdfDict, pdfInlineImage, pdfName, pdfNumber, type PdfObject } from '../../src/parser/types.js';

const content = (source: string): ContentStream => parseContentStream(new TextEncoder().encode(source));

const tiling = (source: string, colored: boolean): TilingPattern => ({
  kind: 'tiling', content: content(source), resources: new MemoryResourceScope(), colored,
});

const inlineImage = (entries: Array<[string, PdfObject]>, data: number[]) =>
  op('BI', pdfInlineImage(pdfDict(new Map(entries)), new Uint8Array(data)));

const imageXObject = (colorspace: ImageXObject['colorspace'], data: number[]): ImageXObject => ({
  kind: 'image', width: 2, height: 1, colorspace, bitsPerComponent: 8, filters: [], data: new Uint8Array(data),
});

/** Counts pattern lookups */
class CountingScope extends MemoryResourceScope {
  patternLookups = 0;

  override getPattern(name: string): Pattern | undefined {
    this.patternLookups++;
    return super.getPattern(name);
  }
}

function captureWarnings(): string[] {
  const warnings: string[] = [];
  const logger: Logger = { debug: () => {}, warn: (message) => warnings.push(message), error: () => {} };
  setLogger(logger);
  return warnings;
}

afterEach(() => setLogger(null));

describe('isColored: color operators', () => {
  it('finds an RGB fill color', () => {
    expect(isColored(content('1 0 0 rg 0 0 10 10 re f'), new MemoryResourceScope())).toBe(true);
  });

  it('finds a CMYK stroke color', () => {
    expect(isColored(content('0 1 0 0 K 0 0 m 5 5 l S'), new MemoryResourceScope())).toBe(true);
  });

  it('ignores gray set in any colorspace', () => {
    const stream = content('0.5 g 0.2 0.2 0.2 rg 0 0 0 0.4 K 0 0 1 1 re f');
    expect(isColored(stream, new MemoryResourceScope())).toBe(false);
  });

  it('does not count text drawn in the default black', () => {
    expect(isColored(content('BT /F1 12 Tf (Hello) Tj ET'), new MemoryResourceScope())).toBe(false);
  });

  it('judges SC colors in named colorspaces', () => {
    const spot: SpotSpace = {
      kind: 'Separation',
      colorants: ['Spot'],
      alternate: DEVICE_CMYK,
      tintTransform: { type: 2, domain: [0, 1], c0: [0, 0, 0, 0], c1: [0, 0, 0, 1], n: 1 },
    };
    const resources = new MemoryResourceScope({ colorspaces: { CS0: DEVICE_RGB, CS1: spot } });
    expect(isColored(content('/CS1 CS 0.8 SC'), resources)).toBe(false);
    expect(isColored(content('/CS0 cs 0 0.5 0 sc'), resources)).toBe(true);
  });

  it('counts a color as soon as it is set', () => {
    expect(isColored(content('q 1 0 0 rg Q 0 0 1 1 re f'), new MemoryResourceScope())).toBe(true);
  });
});

describe('isColored: shadings', () => {
  const resources = new MemoryResourceScope({
    shadings: { Gray: { colorspace: DEVICE_GRAY }, Rgb: { colorspace: DEVICE_RGB } },
  });

  it('judges shadings by their colorspace', () => {
    expect(isColored(content('/Gray sh'), resources)).toBe(false);
    expect(isColored(content('/Rgb sh'), resources)).toBe(true);
  });

  it('throws for an undefined shading', () => {
    expect(() => isColored(content('/Sh9 sh'), resources)).toThrow(UndefinedShadingError);
  });
});

describe('isShadingColored', () => {
  it('takes one component as gray and three or four as color', () => {
    expect(isShadingColored({ colorspace: DEVICE_GRAY })).toBe(false);
    expect(isShadingColored({ colorspace: DEVICE_RGB })).toBe(true);
    expect(isShadingColored({ colorspace: DEVICE_CMYK })).toBe(true);
  });

  it('rejects other component counts', () => {
    const twoInks: Shading = {
      colorspace: {
        kind: 'DeviceN',
        colorants: ['A', 'B'],
        alternate: DEVICE_GRAY,
        tintTransform: { type: 2, domain: [0, 1], c0: [0], c1: [1], n: 1 },
      },
    };
    expect(() => isShadingColored(twoInks)).toThrow(UnsupportedColorspaceError);
  });
});

describe('isPatternColored', () => {
  it('judges colored tiling patterns by their content', () => {
    expect(isPatternColored(tiling('0 0 1 rg 0 0 1 1 re f', true))).toBe(true);
    expect(isPatternColored(tiling('0.3 g 0 0 1 1 re f', true))).toBe(false);
  });

  it('never counts uncolored tiling patterns', () => {
    expect(isPatternColored(tiling('0 0 1 rg 0 0 1 1 re f', false))).toBe(false);
  });

  it('judges shading patterns by their shading', () => {
    expect(isPatternColored({ kind: 'shading', shading: { colorspace: DEVICE_CMYK } })).toBe(true);
  });
});

describe('isColored: patterns', () => {
  it('follows a colored tiling pattern set with scn', () => {
    const resources = new MemoryResourceScope({ patterns: { P0: tiling('1 0 0 rg 0 0 1 1 re f', true) } });
    expect(isColored(content('/Pattern cs /P0 scn 0 0 5 5 re f'), resources)).toBe(true);
  });

  it('judges an uncolored pattern by its underlying color', () => {
    const resources = new MemoryResourceScope({
      colorspaces: { CS0: { kind: 'Pattern', underlying: DEVICE_RGB } },
      patterns: { P1: tiling('0 0 1 1 re f', false) },
    });
    expect(isColored(content('/CS0 cs 1 0 0 /P1 scn'), resources)).toBe(true);
    expect(isColored(content('/CS0 cs 0.5 0.5 0.5 /P1 scn'), resources)).toBe(false);
  });

  it('throws for an undefined pattern', () => {
    expect(() => isColored(content('/Pattern CS /P9 SCN'), new MemoryResourceScope())).toThrow(UndefinedPatternError);
  });

  it('looks up each pattern once per call', () => {
    const resources = new CountingScope({ patterns: { P0: tiling('0.5 g 0 0 1 1 re f', true) } });
    expect(isColored(content('/Pattern cs /P0 scn /P0 scn /Pattern CS /P0 SCN'), resources)).toBe(false);
    expect(resources.patternLookups).toBe(1);
  });
});

describe('isColored: forms', () => {
  it('recurses into forms with their own resources', () => {
    const formResources = new MemoryResourceScope({ shadings: { Sh0: { colorspace: DEVICE_RGB } } });
    const resources = new MemoryResourceScope({
      xobjects: { Fm0: { kind: 'form', content: content('/Sh0 sh'), resources: formResources } },
    });
    expect(isColored(content('/Fm0 Do'), resources)).toBe(true);
  });

  it('looks up resources of a form without its own in the enclosing scope', () => {
    const resources = new MemoryResourceScope({
      shadings: { Sh0: { colorspace: DEVICE_RGB } },
      xobjects: { Fm0: { kind: 'form', content: content('/Sh0 sh') } },
    });
    expect(isColored(content('/Fm0 Do'), resources)).toBe(true);
  });

  it('skips a form that draws itself', () => {
    const warnings = captureWarnings();
    const resources = new MemoryResourceScope({
      xobjects: { Fm0: { kind: 'form', content: content('0.5 g /Fm0 Do') } },
    });
    expect(isColored(content('/Fm0 Do'), resources)).toBe(false);
    expect(warnings).toEqual(['Skipping form /Fm0: it is nested inside itself']);
  });

  it('stops at the nesting limit', () => {
    const warnings = captureWarnings();
    const resources = new MemoryResourceScope({
      xobjects: {
        Fm0: { kind: 'form', content: content('/Fm1 Do') },
        Fm1: { kind: 'form', content: content('1 0 0 rg') },
      },
    });
    expect(isColored(content('/Fm0 Do'), resources, { maxDepth: 1 })).toBe(false);
    expect(warnings).toEqual(['Skipping form /Fm1: nesting deeper than 1']);
  });

  it('throws for an undefined XObject', () => {
    expect(() => isColored(content('/Im9 Do'), new MemoryResourceScope())).toThrow(UndefinedXObjectError);
  });
});

describe('isColored: images', () => {
  it('inspects inline image pixels', () => {
    const rgb: Array<[string, PdfObject]> = [['W', pdfNumber(2)], ['H', pdfNumber(1)], ['CS', pdfName('RGB')], ['BPC', pdfNumber(8)]];
    expect(isColored([inlineImage(rgb, [9, 9, 9, 200, 40, 40])], new MemoryResourceScope())).toBe(true);
    expect(isColored([inlineImage(rgb, [9, 9, 9, 200, 200, 200])], new MemoryResourceScope())).toBe(false);
  });

  it('takes gray inline images as gray without decoding', () => {
    const gray: Array<[string, PdfObject]> = [['W', pdfNumber(1)], ['H', pdfNumber(1)], ['CS', pdfName('G')], ['F', pdfName('DCT')]];
    expect(isColored([inlineImage(gray, [0])], new MemoryResourceScope())).toBe(false);
  });

  it('takes JPEG 2000 images as color', () => {
    const jpx: Array<[string, PdfObject]> = [['W', pdfNumber(1)], ['H', pdfNumber(1)], ['CS', pdfName('RGB')], ['F', pdfName('JPXDecode')]];
    expect(isColored([inlineImage(jpx, [0])], new MemoryResourceScope())).toBe(true);
  });

  it('inspects image XObjects', () => {
    const resources = new MemoryResourceScope({
      xobjects: {
        Im0: imageXObject(DEVICE_RGB, [0, 0, 0, 255, 255, 255]),
        Im1: imageXObject(DEVICE_CMYK, [0, 0, 0, 0, 255, 0, 0, 0]),
        Im2: imageXObject(DEVICE_GRAY, [0, 255]),
      },
    });
    expect(isColored(content('/Im0 Do'), resources)).toBe(false);
    expect(isColored(content('/Im1 Do'), resources)).toBe(true);
    expect(isColored(content('/Im2 Do'), resources)).toBe(false);
  });
});
