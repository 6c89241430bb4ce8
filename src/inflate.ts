/**
 * Inflate for the concatenated IDAT stream
 *
 * Uses the DecompressionStream API where the platform has it.
 * Falls back to pako in environments lacking native decompression streams.
 */

import type { Inflate, InflateOptions } from 'pako';
import { DecompressionError } from './errors.js';
import { concatBytes } from './utils.js';

type PakoModule = typeof import('pako');

let pakoPromise: Promise<PakoModule> | null = null;
async function loadPako(): Promise<PakoModule> {
  if (!pakoPromise) {
    pakoPromise = import('pako');
  }
  return pakoPromise;
}

/**
 * Create a decompression stream (native or polyfilled via pako)
 */
export function createDecompressionStream(
  format: 'deflate' | 'deflate-raw' = 'deflate'
): ReadableWritablePair<Uint8Array, Uint8Array> {
  if (typeof DecompressionStream !== 'undefined') {
    return new DecompressionStream(format);
  }

  let inflator: Inflate | null = null;
  let ended = false;

  return new TransformStream<Uint8Array, Uint8Array>({
    async transform(chunk, controller) {
      if (!inflator) {
        const pako = await loadPako();
        const options: InflateOptions = format === 'deflate-raw' ? { raw: true } : {};
        const created = new pako.Inflate(options);
        const onEnd = created.onEnd.bind(created);

        created.onData = (data) => {
          if (data instanceof Uint8Array && data.length > 0) {
            controller.enqueue(data);
          }
        };
        created.onEnd = (status) => {
          ended = true;
          onEnd(status);
        };
        inflator = created;
      }

      inflator.push(chunk, false);
      if (inflator.err) {
        throw new Error(`Inflate error: ${inflator.msg}`);
      }
    },

    async flush() {
      if (!inflator) {
        throw new Error('Inflate error: no input');
      }
      inflator.push(new Uint8Array(0), true);
      if (inflator.err) {
        throw new Error(`Inflate error: ${inflator.msg}`);
      }
      if (!ended) {
        throw new Error('Inflate error: unexpected end of compressed stream');
      }
    }
  });
}

/**
 * Inflate a complete zlib stream.
 * Rejects with DecompressionError on corrupt or incomplete input.
 */
export async function inflateData(compressed: Uint8Array): Promise<Uint8Array> {
  const input = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(compressed);
      controller.close();
    }
  });

  const chunks: Uint8Array[] = [];
  try {
    const reader = input.pipeThrough(createDecompressionStream('deflate')).getReader();
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } catch (error) {
    throw new DecompressionError(error);
  }

  return concatBytes(chunks);
}
