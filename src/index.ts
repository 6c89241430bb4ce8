/**
 * Streaming PNG Container Parser
 *
 * Walks the chunk structure of a PNG byte stream without decoding pixels:
 * - Signature check and CRC-validated chunk framing
 * - IHDR header, PLTE palette and unknown chunks kept verbatim
 * - IDAT payloads concatenated in file order and inflated at IEND
 * - Reads from file paths, buffers or async byte streams
 *
 * @example
 * import { parsePng } from 'png-chunk-walker';
 *
 * const png = await parsePng('image.png');
 * console.log(png.header.width, png.header.height, png.rawData.length);
 */

// Main API
export {
  parsePng,
  parsePngFile,
  readPngHeader,
  readPngChunks,
  validateHeader,
  PngParser
} from './png-parser.js';
export type { IndexedChunk } from './png-parser.js';

// Low-level APIs for advanced use
export { ChunkReader, MAX_CHUNK_LENGTH } from './chunk-reader.js';
export {
  BufferByteSource,
  FileByteSource,
  StreamByteSource,
  createByteSource
} from './byte-source.js';
export type { ByteSource, ByteSourceInput } from './byte-source.js';
export { inflateData, createDecompressionStream } from './inflate.js';
export {
  createChunk,
  createIHDR,
  createPLTE,
  createIEND,
  serializeChunk,
  serializeHeader,
  buildPng
} from './png-writer.js';
export * from './errors.js';
export * from './types.js';
export {
  crc32,
  updateCrc32,
  chunkCrc,
  readUInt32BE,
  writeUInt32BE,
  isPngSignature,
  isCriticalChunk,
  isPublicChunk,
  isSafeToCopy,
  PNG_SIGNATURE
} from './utils.js';
