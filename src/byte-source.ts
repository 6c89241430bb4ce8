/**
 * Byte sources for the chunk reader
 *
 * A source hands out exact-size reads from the front of a byte sequence.
 * Reads come back short only when the sequence is exhausted, which is how the
 * chunk reader tells a clean end from a truncated frame.
 */

import { open, FileHandle } from 'node:fs/promises';

/**
 * Sequential reader over some byte sequence
 */
export interface ByteSource {
  /**
   * Read the next `length` bytes.
   * Resolves with fewer bytes (possibly none) only at end of data.
   */
  read(length: number): Promise<Uint8Array>;

  /**
   * Release file handles or stream iterators
   */
  close(): Promise<void>;
}

/**
 * Input types that can be automatically converted to sources
 */
export type ByteSourceInput = string | Uint8Array | ArrayBuffer | AsyncIterable<Uint8Array> | ByteSource;

/**
 * Source over bytes already in memory. Reads are views, not copies.
 */
export class BufferByteSource implements ByteSource {
  private data: Uint8Array;
  private offset = 0;

  constructor(data: Uint8Array | ArrayBuffer) {
    this.data = data instanceof Uint8Array ? data : new Uint8Array(data);
  }

  async read(length: number): Promise<Uint8Array> {
    const end = Math.min(this.offset + length, this.data.length);
    const bytes = this.data.subarray(this.offset, end);
    this.offset = end;
    return bytes;
  }

  async close(): Promise<void> {
    // No resources to clean up for memory-based input
  }
}

/**
 * Source that reads a file from disk on demand
 */
export class FileByteSource implements ByteSource {
  private fileHandle: FileHandle | null = null;
  private position = 0;
  private size = 0;
  private closed = false;
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async read(length: number): Promise<Uint8Array> {
    if (this.closed) {
      throw new Error('File source already closed');
    }
    if (!this.fileHandle) {
      this.fileHandle = await open(this.filePath, 'r');
      this.size = (await this.fileHandle.stat()).size;
    }

    // A declared length never sizes the buffer past what the file holds
    const wanted = Math.max(0, Math.min(length, this.size - this.position));
    const buffer = new Uint8Array(wanted);
    let filled = 0;
    while (filled < wanted) {
      const { bytesRead } = await this.fileHandle.read(buffer, filled, wanted - filled, this.position);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
      this.position += bytesRead;
    }

    return filled === wanted ? buffer : buffer.subarray(0, filled);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.fileHandle) {
      await this.fileHandle.close();
      this.fileHandle = null;
    }
  }
}

/**
 * Source over an async sequence of byte pieces (Node Readable, web
 * ReadableStream, generator). Pieces are split and joined to satisfy each read.
 */
export class StreamByteSource implements ByteSource {
  private iterator: AsyncIterator<Uint8Array>;
  private pending: Uint8Array[] = [];
  private pendingLength = 0;
  private done = false;

  constructor(stream: AsyncIterable<Uint8Array>) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  async read(length: number): Promise<Uint8Array> {
    while (this.pendingLength < length && !this.done) {
      const { value, done } = await this.iterator.next();
      if (done) {
        this.done = true;
        break;
      }
      if (value.length > 0) {
        this.pending.push(value);
        this.pendingLength += value.length;
      }
    }

    return this.take(Math.min(length, this.pendingLength));
  }

  async close(): Promise<void> {
    this.pending = [];
    this.pendingLength = 0;
    if (!this.done) {
      this.done = true;
      await this.iterator.return?.();
    }
  }

  private take(length: number): Uint8Array {
    const result = new Uint8Array(length);
    let filled = 0;

    while (filled < length) {
      const head = this.pending[0];
      const needed = length - filled;
      if (head.length <= needed) {
        result.set(head, filled);
        filled += head.length;
        this.pending.shift();
      } else {
        result.set(head.subarray(0, needed), filled);
        filled += needed;
        this.pending[0] = head.subarray(needed);
      }
    }

    this.pendingLength -= length;
    return result;
  }
}

function isByteSource(input: object): input is ByteSource {
  return 'read' in input && typeof input.read === 'function' &&
    'close' in input && typeof input.close === 'function';
}

function isAsyncIterable(input: object): input is AsyncIterable<Uint8Array> {
  return Symbol.asyncIterator in input;
}

/**
 * Factory function to create appropriate source for any input type
 */
export function createByteSource(input: ByteSourceInput): ByteSource {
  if (typeof input === 'string') {
    return new FileByteSource(input);
  }

  if (input instanceof Uint8Array || input instanceof ArrayBuffer) {
    return new BufferByteSource(input);
  }

  if (typeof input === 'object' && input !== null) {
    // fs.ReadStream has read() and close() too, so iterables are checked first
    if (isAsyncIterable(input)) {
      return new StreamByteSource(input);
    }
    if (isByteSource(input)) {
      return input;
    }
  }

  throw new TypeError(
    'Unsupported input type. Expected string (file path), Uint8Array, ArrayBuffer, AsyncIterable<Uint8Array>, or ByteSource'
  );
}
