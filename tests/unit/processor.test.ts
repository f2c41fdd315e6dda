import { describe, it, expect, afterEach } from 'vitest';
import { applyColorOperator, processContentStream } from '../../src/content/processor.js';
import { defaultGraphicsState } from '../../src/content/graphics-state.js';
import { parseContentStream } from '../../src/content/parser.js';
import { op } from '../../src/content/operators.js';
import { MemoryResourceScope } from '../../src/resources/memory-scope.js';
import { cmykColor, grayColor, patternColor, rgbColor } from '../../src/color/color.js';
import { DEVICE_CMYK, DEVICE_GRAY, DEVICE_RGB, PATTERN } from '../../src/color/colorspace.js';
import { setLogger, type Logger } from '../../src/logger.js';
import { PdfParseError, UndefinedColorspaceError } from '../../src/errors.js';
import { pdfName, pdfNumber } from '../../src/parser/types.js';

const content = (source: string) => parseContentStream(new TextEncoder().encode(source));
const noResources = new MemoryResourceScope();

afterEach(() => setLogger(null));

describe('defaultGraphicsState', () => {
  it('starts with black in DeviceGray and filled text', () => {
    expect(defaultGraphicsState()).toEqual({
      strokingColorspace: DEVICE_GRAY,
      strokingColor: grayColor(0),
      nonStrokingColorspace: DEVICE_GRAY,
      nonStrokingColor: grayColor(0),
      textRenderMode: 0,
    });
  });
});

describe('applyColorOperator', () => {
  const initial = defaultGraphicsState();

  it('sets device colors with their colorspace', () => {
    expect(applyColorOperator(initial, op('RG', pdfNumber(1), pdfNumber(0), pdfNumber(0)), noResources)).toMatchObject({
      strokingColorspace: DEVICE_RGB, strokingColor: rgbColor(1, 0, 0), nonStrokingColor: grayColor(0),
    });
    expect(applyColorOperator(initial, op('k', pdfNumber(0), pdfNumber(0), pdfNumber(0), pdfNumber(1)), noResources))
      .toMatchObject({ nonStrokingColorspace: DEVICE_CMYK, nonStrokingColor: cmykColor(0, 0, 0, 1) });
  });

  it('resets the color when the colorspace changes', () => {
    const state = applyColorOperator(initial, op('CS', pdfName('DeviceCMYK')), noResources);
    expect(state.strokingColor).toEqual(cmykColor(0, 0, 0, 1));
    expect(applyColorOperator(initial, op('cs', pdfName('Pattern')), noResources)).toMatchObject({
      nonStrokingColorspace: PATTERN, nonStrokingColor: patternColor(''),
    });
  });

  it('reads named colorspaces from the resources', () => {
    const resources = new MemoryResourceScope({ colorspaces: { CS0: DEVICE_RGB } });
    const state = applyColorOperator(initial, op('cs', pdfName('CS0')), resources);
    expect(applyColorOperator(state, op('sc', pdfNumber(0), pdfNumber(0.5), pdfNumber(1)), resources).nonStrokingColor)
      .toEqual(rgbColor(0, 0.5, 1));
  });

  it('keeps the text render mode', () => {
    expect(applyColorOperator(initial, op('Tr', pdfNumber(3)), noResources).textRenderMode).toBe(3);
  });

  it('returns the same state for other operators', () => {
    expect(applyColorOperator(initial, op('re', pdfNumber(0), pdfNumber(0), pdfNumber(1), pdfNumber(1)), noResources))
      .toBe(initial);
  });

  it('rejects malformed operands', () => {
    expect(() => applyColorOperator(initial, op('rg', pdfNumber(1)), noResources)).toThrow(PdfParseError);
    expect(() => applyColorOperator(initial, op('cs', pdfNumber(1)), noResources)).toThrow(PdfParseError);
    expect(() => applyColorOperator(initial, op('Tr', pdfName('Fill')), noResources)).toThrow(PdfParseError);
    expect(() => applyColorOperator(initial, op('CS', pdfName('CS9')), noResources)).toThrow(UndefinedColorspaceError);
  });

  it('needs an underlying colorspace for pattern components', () => {
    const state = applyColorOperator(initial, op('cs', pdfName('Pattern')), noResources);
    expect(() => applyColorOperator(state, op('scn', pdfNumber(1), pdfName('P0')), noResources)).toThrow(PdfParseError);
    expect(() => applyColorOperator(state, op('scn', pdfNumber(1)), noResources)).toThrow(PdfParseError);
  });
});

describe('processContentStream', () => {
  it('runs the catch-all handler before the operator handler, with the updated state', () => {
    const calls: string[] = [];
    processContentStream(content('1 0 0 rg 0 0 1 1 re f'), noResources, {
      all: (o) => calls.push(`all ${o.name}`),
      operators: {
        f: (_o, state) => calls.push(`f ${state.nonStrokingColor.kind}`),
      },
    });
    expect(calls).toEqual(['all rg', 'all re', 'all f', 'f RGB']);
  });

  it('saves and restores the state', () => {
    const fills: number[] = [];
    processContentStream(content('0.2 g q 0.7 g f Q f'), noResources, {
      operators: {
        f: (_o, state) => {
          if (state.nonStrokingColor.kind === 'Gray') fills.push(state.nonStrokingColor.gray);
        },
      },
    });
    expect(fills).toEqual([0.7, 0.2]);
  });

  it('warns about an unmatched Q and keeps going', () => {
    const warnings: string[] = [];
    const logger: Logger = { debug: () => {}, warn: (message) => warnings.push(message), error: () => {} };
    setLogger(logger);
    const final = processContentStream(content('Q 0.5 G'), noResources, {});
    expect(warnings).toEqual(['Q without matching q ignored']);
    expect(final.strokingColor).toEqual(grayColor(0.5));
  });

  it('ignores operators named like Object prototype members', () => {
    expect(() => processContentStream([op('toString')], noResources, { operators: {} })).not.toThrow();
  });

  it('stops at the first handler error', () => {
    const seen: string[] = [];
    expect(() => processContentStream(content('q n Q'), noResources, {
      all: (o) => {
        seen.push(o.name);
        if (o.name === 'n') throw new PdfParseError('stop');
      },
    })).toThrow('stop');
    expect(seen).toEqual(['q', 'n']);
  });
});
