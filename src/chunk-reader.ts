import type { ByteSource } from './byte-source.js';
import type { ChunkReadResult, ChunkReaderOptions } from './types.js';
import { ChunkTooLargeError, TruncatedChunkError } from './errors.js';
import { chunkCrc, chunkTypeToString, readUInt32BE } from './utils.js';

/**
 * Largest chunk length the PNG format allows
 */
export const MAX_CHUNK_LENGTH = 0x7fffffff;

/**
 * Reads length-prefixed, CRC-protected chunk frames from a byte source.
 *
 * The source must be positioned at a chunk boundary (just past the
 * signature for a PNG file). After a thrown error the source position is
 * unspecified and the stream should be abandoned.
 */
export class ChunkReader {
  private source: ByteSource;
  private maxChunkLength: number;

  constructor(source: ByteSource, options: ChunkReaderOptions = {}) {
    this.source = source;
    this.maxChunkLength = Math.min(options.maxChunkLength ?? MAX_CHUNK_LENGTH, MAX_CHUNK_LENGTH);
  }

  /**
   * Read the next chunk from the source
   */
  async readChunk(): Promise<ChunkReadResult> {
    const lengthBytes = await this.source.read(4);
    if (lengthBytes.length === 0) {
      return { status: 'end' };
    }
    if (lengthBytes.length < 4) {
      throw new TruncatedChunkError('length', 4, lengthBytes.length);
    }

    const length = readUInt32BE(lengthBytes, 0);
    if (length > this.maxChunkLength) {
      throw new ChunkTooLargeError(length, this.maxChunkLength);
    }

    // Copied so the chunk owns its bytes whatever the source hands out
    const typeBytes = (await this.readExact('type', 4)).slice();
    const data = (await this.readExact('data', length)).slice();
    const crc = readUInt32BE(await this.readExact('crc', 4), 0);

    const chunk = { length, type: chunkTypeToString(typeBytes), typeBytes, data, crc };

    // Verify CRC (includes type + data)
    const computedCrc = chunkCrc(typeBytes, data);
    if (computedCrc !== crc) {
      return { status: 'crc-mismatch', chunk, computedCrc };
    }

    return { status: 'chunk', chunk };
  }

  private async readExact(field: 'type' | 'data' | 'crc', length: number): Promise<Uint8Array> {
    const bytes = length === 0 ? new Uint8Array(0) : await this.source.read(length);
    if (bytes.length < length) {
      throw new TruncatedChunkError(field, length, bytes.length);
    }
    return bytes;
  }
}
