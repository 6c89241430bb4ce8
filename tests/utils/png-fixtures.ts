/**
 * Test PNG Fixture Utilities
 *
 * Builds small PNG byte streams in memory so tests need no files on disk.
 */

import { deflate } from 'pako';
import { createChunk, createIEND, createIHDR, buildPng } from '../../src/png-writer.js';
import { ColorType } from '../../src/types.js';
import type { PngChunk, PngHeader } from '../../src/types.js';
import type { ByteSource } from '../../src/byte-source.js';
import { BufferByteSource } from '../../src/byte-source.js';

/**
 * 8-bit RGB header, overridable field by field
 */
export function testHeader(overrides: Partial<PngHeader> = {}): PngHeader {
  return {
    width: 2,
    height: 2,
    bitDepth: 8,
    colorType: ColorType.RGB,
    compressionMethod: 0,
    filterMethod: 0,
    interlaceMethod: 0,
    ...overrides
  };
}

/**
 * Filtered scanlines for a header: each row is a 0 filter byte followed by
 * `bytesPerRow` sample bytes counting up from the row number.
 */
export function testScanlines(height: number, bytesPerRow: number): Uint8Array {
  const data = new Uint8Array(height * (bytesPerRow + 1));
  let offset = 0;
  for (let y = 0; y < height; y++) {
    data[offset++] = 0;
    for (let x = 0; x < bytesPerRow; x++) {
      data[offset++] = (y + x) & 0xff;
    }
  }
  return data;
}

/**
 * IDAT chunks holding `raw` compressed with zlib, split into `parts` pieces
 */
export function createIdatChunks(raw: Uint8Array, parts = 1): PngChunk[] {
  const compressed = deflate(raw);
  const size = Math.ceil(compressed.length / parts);
  const chunks: PngChunk[] = [];
  for (let offset = 0; offset < compressed.length; offset += size) {
    chunks.push(createChunk('IDAT', compressed.slice(offset, offset + size)));
  }
  return chunks;
}

/**
 * Complete PNG: IHDR, any extra chunks, IDAT for `raw`, IEND
 */
export function createTestPng(
  raw: Uint8Array,
  options: { header?: PngHeader; before?: PngChunk[]; idatParts?: number } = {}
): Uint8Array {
  const header = options.header ?? testHeader();
  return buildPng([
    createIHDR(header),
    ...(options.before ?? []),
    ...createIdatChunks(raw, options.idatParts),
    createIEND()
  ]);
}

/**
 * ByteSource that records every read request
 */
export class RecordingByteSource implements ByteSource {
  readonly reads: number[] = [];
  closed = false;
  private inner: BufferByteSource;

  constructor(data: Uint8Array) {
    this.inner = new BufferByteSource(data);
  }

  async read(length: number): Promise<Uint8Array> {
    this.reads.push(length);
    return this.inner.read(length);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
