import { deflateSync, inflateSync } from 'node:zlib';
import { setDeflate, setInflate } from '../src/stream/flate-impl.js';

function nodeInflate(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(inflateSync(data));
  } catch {
    return new Uint8Array(inflateSync(data, { finishFlush: 0 }));
  }
}

setInflate(nodeInflate);
setDeflate((data) => new Uint8Array(deflateSync(data)));
