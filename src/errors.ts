/**
 * Machine-readable failure kinds raised while parsing a PNG container
 */
export type PngErrorCode =
  | 'SIGNATURE_MISMATCH'
  | 'TRUNCATED_CHUNK'
  | 'CHUNK_TOO_LARGE'
  | 'CRC_MISMATCH'
  | 'MISSING_HEADER'
  | 'INVALID_HEADER'
  | 'INVALID_PALETTE'
  | 'EMPTY_IMAGE_DATA'
  | 'MISSING_IMAGE_END'
  | 'DECOMPRESSION_FAILURE';

/**
 * Base class for every parse failure
 */
export class PngParseError extends Error {
  readonly code: PngErrorCode;

  constructor(code: PngErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PngParseError';
    this.code = code;
  }
}

export class SignatureMismatchError extends PngParseError {
  constructor() {
    super('SIGNATURE_MISMATCH', 'Invalid PNG signature');
    this.name = 'SignatureMismatchError';
  }
}

/** Framing field the source ran out of bytes in */
export type ChunkField = 'length' | 'type' | 'data' | 'crc';

/**
 * The source ended in the middle of a chunk frame
 */
export class TruncatedChunkError extends PngParseError {
  readonly field: ChunkField;
  readonly expected: number;
  readonly received: number;

  constructor(field: ChunkField, expected: number, received: number) {
    super(
      'TRUNCATED_CHUNK',
      `Incomplete PNG chunk: expected ${expected} bytes of ${field}, got ${received}`
    );
    this.name = 'TruncatedChunkError';
    this.field = field;
    this.expected = expected;
    this.received = received;
  }
}

export class ChunkTooLargeError extends PngParseError {
  readonly length: number;

  constructor(length: number, limit: number) {
    super('CHUNK_TOO_LARGE', `Chunk length ${length} exceeds limit of ${limit} bytes`);
    this.name = 'ChunkTooLargeError';
    this.length = length;
  }
}

export class CrcMismatchError extends PngParseError {
  readonly chunkType: string;
  readonly expectedCrc: number;
  readonly computedCrc: number;

  constructor(chunkType: string, expectedCrc: number, computedCrc: number) {
    super('CRC_MISMATCH', `CRC mismatch for chunk ${chunkType || '<non-ASCII>'}`);
    this.name = 'CrcMismatchError';
    this.chunkType = chunkType;
    this.expectedCrc = expectedCrc;
    this.computedCrc = computedCrc;
  }
}

export class MissingHeaderError extends PngParseError {
  constructor(firstType: string) {
    super('MISSING_HEADER', `First chunk must be IHDR, found ${firstType || '<non-ASCII>'}`);
    this.name = 'MissingHeaderError';
  }
}

export class InvalidHeaderError extends PngParseError {
  constructor(message: string) {
    super('INVALID_HEADER', message);
    this.name = 'InvalidHeaderError';
  }
}

export class InvalidPaletteError extends PngParseError {
  constructor(message: string) {
    super('INVALID_PALETTE', message);
    this.name = 'InvalidPaletteError';
  }
}

export class EmptyImageDataError extends PngParseError {
  constructor() {
    super('EMPTY_IMAGE_DATA', 'No IDAT chunks found in PNG');
    this.name = 'EmptyImageDataError';
  }
}

export class MissingImageEndError extends PngParseError {
  constructor() {
    super('MISSING_IMAGE_END', 'PNG stream ended before IEND chunk');
    this.name = 'MissingImageEndError';
  }
}

export class DecompressionError extends PngParseError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('DECOMPRESSION_FAILURE', `Failed to inflate image data: ${detail}`, { cause });
    this.name = 'DecompressionError';
  }
}
