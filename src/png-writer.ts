import type { PaletteEntry, PngChunk, PngHeader } from './types.js';
import {
  chunkCrc,
  chunkTypeToString,
  writeUInt32BE,
  stringToBytes,
  PNG_SIGNATURE
} from './utils.js';

/**
 * Create a PNG chunk
 */
export function createChunk(type: string | Uint8Array, data: Uint8Array): PngChunk {
  const typeBytes = typeof type === 'string' ? stringToBytes(type) : type.slice();
  if (typeBytes.length !== 4) {
    throw new Error('Chunk type must be exactly 4 characters');
  }

  return {
    length: data.length,
    type: chunkTypeToString(typeBytes),
    typeBytes,
    data,
    crc: chunkCrc(typeBytes, data)
  };
}

/**
 * Serialize a chunk to bytes. The stored CRC is written as is.
 */
export function serializeChunk(chunk: PngChunk): Uint8Array {
  const buffer = new Uint8Array(12 + chunk.data.length);
  let offset = 0;

  writeUInt32BE(buffer, chunk.data.length, offset);
  offset += 4;

  buffer.set(chunk.typeBytes, offset);
  offset += 4;

  buffer.set(chunk.data, offset);
  offset += chunk.data.length;

  writeUInt32BE(buffer, chunk.crc, offset);

  return buffer;
}

/**
 * Write header fields back into a 13-byte IHDR payload
 */
export function serializeHeader(header: PngHeader): Uint8Array {
  const data = new Uint8Array(13);

  writeUInt32BE(data, header.width, 0);
  writeUInt32BE(data, header.height, 4);
  data[8] = header.bitDepth;
  data[9] = header.colorType;
  data[10] = header.compressionMethod;
  data[11] = header.filterMethod;
  data[12] = header.interlaceMethod;

  return data;
}

/**
 * Create IHDR chunk from header information
 */
export function createIHDR(header: PngHeader): PngChunk {
  return createChunk('IHDR', serializeHeader(header));
}

/**
 * Create PLTE chunk from palette entries
 */
export function createPLTE(palette: PaletteEntry[]): PngChunk {
  const data = new Uint8Array(palette.length * 3);
  palette.forEach((entry, i) => {
    data[i * 3] = entry.r;
    data[i * 3 + 1] = entry.g;
    data[i * 3 + 2] = entry.b;
  });
  return createChunk('PLTE', data);
}

/**
 * Create IEND chunk
 */
export function createIEND(): PngChunk {
  return createChunk('IEND', new Uint8Array(0));
}

/**
 * Build a complete PNG byte stream from chunks
 */
export function buildPng(chunks: PngChunk[]): Uint8Array {
  let totalSize = PNG_SIGNATURE.length;
  for (const chunk of chunks) {
    totalSize += 12 + chunk.data.length; // length(4) + type(4) + data + crc(4)
  }

  const buffer = new Uint8Array(totalSize);
  let offset = 0;

  buffer.set(PNG_SIGNATURE, offset);
  offset += PNG_SIGNATURE.length;

  for (const chunk of chunks) {
    const chunkBytes = serializeChunk(chunk);
    buffer.set(chunkBytes, offset);
    offset += chunkBytes.length;
  }

  return buffer;
}
