/**
 * Colorspaces to and from their PDF object form.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import {
  pdfArray, pdfDict, pdfName, pdfNumber, pdfString,
  dictGet, dictGetNumber, isArray, isDict, isName, isNumber, isStream, isString,
} from '../parser/types.js';
import { decodeStream, type ResolveFn } from '../stream/decoder.js';
import { PdfParseError, PdfUnsupportedError } from '../errors.js';
import { functionToPdfObject, parseFunction } from '../function/pdf-function.js';
import {
  type Colorspace, type Tristimulus,
  DEVICE_CMYK, DEVICE_GRAY, DEVICE_RGB, D65_WHITE_POINT, builtinColorspace,
} from '../color/colorspace.js';

const identity: ResolveFn = (obj) => obj;

export function parseColorspace(obj: PdfObject, resolve: ResolveFn = identity): Colorspace {
  const resolved = resolve(obj);

  if (isName(resolved)) {
    const space = builtinColorspace(resolved.value);
    if (!space) throw new PdfUnsupportedError(`Unknown colorspace name /${resolved.value}`);
    return space;
  }
  if (!isArray(resolved) || resolved.items.length === 0) {
    throw new PdfParseError('Colorspace must be a name or an array');
  }

  const items = resolved.items.map(resolve);
  const family = items[0];
  if (!isName(family)) throw new PdfParseError('Colorspace array must start with a name');

  switch (family.value) {
    case 'DeviceGray': case 'G':
    case 'DeviceRGB': case 'RGB':
    case 'DeviceCMYK': case 'CMYK':
      return parseColorspace(family);

    case 'CalGray': {
      const dict = paramsDict(items[1]);
      return {
        kind: 'CalGray',
        whitePoint: tristimulus(dict, 'WhitePoint', D65_WHITE_POINT),
        blackPoint: tristimulus(dict, 'BlackPoint', [0, 0, 0]),
        gamma: dictGetNumber(dict, 'Gamma') ?? 1,
      };
    }

    case 'CalRGB': {
      const dict = paramsDict(items[1]);
      return {
        kind: 'CalRGB',
        whitePoint: tristimulus(dict, 'WhitePoint', D65_WHITE_POINT),
        blackPoint: tristimulus(dict, 'BlackPoint', [0, 0, 0]),
        gamma: tristimulus(dict, 'Gamma', [1, 1, 1]),
        matrix: numberList(dictGet(dict, 'Matrix'), 9) ?? [1, 0, 0, 0, 1, 0, 0, 0, 1],
      };
    }

    case 'Lab': {
      const dict = paramsDict(items[1]);
      const range = numberList(dictGet(dict, 'Range'), 4) ?? [-100, 100, -100, 100];
      return {
        kind: 'Lab',
        whitePoint: tristimulus(dict, 'WhitePoint', D65_WHITE_POINT),
        blackPoint: tristimulus(dict, 'BlackPoint', [0, 0, 0]),
        range: [range[0], range[1], range[2], range[3]],
      };
    }

    case 'ICCBased': {
      const stream = items[1];
      if (!stream || !isStream(stream)) throw new PdfParseError('ICCBased colorspace needs a stream');
      const alternate = dictGet(stream.dict, 'Alternate');
      if (alternate) return parseColorspace(alternate, resolve);
      switch (dictGetNumber(stream.dict, 'N')) {
        case 1: return DEVICE_GRAY;
        case 3: return DEVICE_RGB;
        case 4: return DEVICE_CMYK;
        default: throw new PdfParseError('ICCBased colorspace needs /N of 1, 3 or 4');
      }
    }

    case 'Indexed':
    case 'I': {
      if (items.length < 4) throw new PdfParseError('Indexed colorspace needs base, hival and lookup');
      const base = parseColorspace(items[1], resolve);
      const hival = items[2];
      if (!isNumber(hival)) throw new PdfParseError('Indexed colorspace hival must be a number');
      const table = items[3];
      let lookup: Uint8Array;
      if (isString(table)) lookup = table.value;
      else if (isStream(table)) lookup = decodeStream(table.data, table.dict, resolve);
      else throw new PdfParseError('Indexed colorspace lookup must be a string or stream');
      return { kind: 'Indexed', base, hival: hival.value, lookup };
    }

    case 'Pattern':
      return items.length > 1
        ? { kind: 'Pattern', underlying: parseColorspace(items[1], resolve) }
        : { kind: 'Pattern' };

    case 'Separation': {
      const colorant = items[1];
      if (!colorant || !isName(colorant) || items.length < 4) {
        throw new PdfParseError('Separation colorspace needs a colorant name, alternate and tint transform');
      }
      return {
        kind: 'Separation',
        colorants: [colorant.value],
        alternate: parseColorspace(items[2], resolve),
        tintTransform: parseFunction(items[3], resolve),
      };
    }

    case 'DeviceN': {
      const names = items[1];
      if (!names || !isArray(names) || items.length < 4) {
        throw new PdfParseError('DeviceN colorspace needs colorant names, alternate and tint transform');
      }
      const attributes = items[4];
      return {
        kind: 'DeviceN',
        colorants: names.items.map(resolve).map((n) => (isName(n) ? n.value : 'None')),
        alternate: parseColorspace(items[2], resolve),
        tintTransform: parseFunction(items[3], resolve),
        ...(attributes && isDict(attributes) ? { attributes } : {}),
      };
    }

    default:
      throw new PdfUnsupportedError(`Unsupported colorspace family /${family.value}`);
  }
}

export function colorspaceToPdfObject(space: Colorspace): PdfObject {
  switch (space.kind) {
    case 'DeviceGray':
    case 'DeviceRGB':
    case 'DeviceCMYK':
      return pdfName(space.kind);
    case 'CalGray':
      return pdfArray([pdfName('CalGray'), pdfDict(new Map<string, PdfObject>([
        ['WhitePoint', numberArray(space.whitePoint)],
        ['BlackPoint', numberArray(space.blackPoint)],
        ['Gamma', pdfNumber(space.gamma)],
      ]))]);
    case 'CalRGB':
      return pdfArray([pdfName('CalRGB'), pdfDict(new Map<string, PdfObject>([
        ['WhitePoint', numberArray(space.whitePoint)],
        ['BlackPoint', numberArray(space.blackPoint)],
        ['Gamma', numberArray(space.gamma)],
        ['Matrix', numberArray(space.matrix)],
      ]))]);
    case 'Lab':
      return pdfArray([pdfName('Lab'), pdfDict(new Map<string, PdfObject>([
        ['WhitePoint', numberArray(space.whitePoint)],
        ['BlackPoint', numberArray(space.blackPoint)],
        ['Range', numberArray(space.range)],
      ]))]);
    case 'Indexed':
      return pdfArray([
        pdfName('Indexed'),
        colorspaceToPdfObject(space.base),
        pdfNumber(space.hival),
        pdfString(space.lookup),
      ]);
    case 'Pattern':
      return space.underlying
        ? pdfArray([pdfName('Pattern'), colorspaceToPdfObject(space.underlying)])
        : pdfName('Pattern');
    case 'Separation':
      return pdfArray([
        pdfName('Separation'),
        pdfName(space.colorants[0] ?? 'None'),
        colorspaceToPdfObject(space.alternate),
        functionToPdfObject(space.tintTransform),
      ]);
    case 'DeviceN': {
      const items: PdfObject[] = [
        pdfName('DeviceN'),
        pdfArray(space.colorants.map(pdfName)),
        colorspaceToPdfObject(space.alternate),
        functionToPdfObject(space.tintTransform),
      ];
      if (space.attributes) items.push(space.attributes);
      return pdfArray(items);
    }
  }
}

// ─── Helpers ───

function paramsDict(obj: PdfObject | undefined): PdfDict {
  return obj && isDict(obj) ? obj : pdfDict();
}

function tristimulus(dict: PdfDict, key: string, fallback: Tristimulus): Tristimulus {
  const values = numberList(dictGet(dict, key), 3);
  return values ? [values[0], values[1], values[2]] : fallback;
}

function numberList(obj: PdfObject | undefined, length: number): number[] | undefined {
  if (!obj || !isArray(obj) || obj.items.length < length) return undefined;
  const values: number[] = [];
  for (const item of obj.items.slice(0, length)) {
    if (!isNumber(item)) return undefined;
    values.push(item.value);
  }
  return values;
}

function numberArray(values: readonly number[]): PdfObject {
  return pdfArray(values.map(pdfNumber));
}
