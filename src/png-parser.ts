import type {
  DecodedPng,
  Inflater,
  PaletteEntry,
  PngChunk,
  PngHeader,
  PngParseOptions,
  ValidationMode,
  CrcMismatchPolicy
} from './types.js';
import { ColorType } from './types.js';
import { createByteSource } from './byte-source.js';
import type { ByteSource, ByteSourceInput } from './byte-source.js';
import { ChunkReader } from './chunk-reader.js';
import { inflateData } from './inflate.js';
import {
  CrcMismatchError,
  DecompressionError,
  EmptyImageDataError,
  InvalidHeaderError,
  InvalidPaletteError,
  MissingHeaderError,
  MissingImageEndError,
  PngParseError,
  SignatureMismatchError
} from './errors.js';
import { concatBytes, isCriticalChunk, isPngSignature, readUInt32BE, PNG_SIGNATURE } from './utils.js';

/**
 * Largest width or height IHDR may declare
 */
const MAX_DIMENSION = 0x7fffffff;

/**
 * Bit depths each color type permits
 */
const ALLOWED_BIT_DEPTHS = new Map<number, readonly number[]>([
  [ColorType.GRAYSCALE, [1, 2, 4, 8, 16]],
  [ColorType.RGB, [8, 16]],
  [ColorType.PALETTE, [1, 2, 4, 8]],
  [ColorType.GRAYSCALE_ALPHA, [8, 16]],
  [ColorType.RGBA, [8, 16]]
]);

function emptyHeader(): PngHeader {
  return {
    width: 0,
    height: 0,
    bitDepth: 0,
    colorType: 0,
    compressionMethod: 0,
    filterMethod: 0,
    interlaceMethod: 0
  };
}

interface ResolvedOptions {
  validation: ValidationMode;
  onCrcMismatch: CrcMismatchPolicy;
  inflate: Inflater;
  logger: (message: string) => void;
  onChunk?: (chunk: PngChunk, index: number) => void;
}

function resolveOptions(options: PngParseOptions): ResolvedOptions {
  return {
    validation: options.validation ?? 'strict',
    onCrcMismatch: options.onCrcMismatch ?? 'throw',
    inflate: options.inflate ?? inflateData,
    logger: options.logger ?? console.warn,
    onChunk: options.onChunk
  };
}

/**
 * A chunk together with its position among all chunks read
 */
export interface IndexedChunk {
  chunk: PngChunk;
  index: number;
}

/**
 * Walks a PNG container and folds its chunks into a DecodedPng.
 *
 * One parser consumes one source. The source is not closed by the parser;
 * use `parsePng` to have it opened and closed for you.
 */
export class PngParser {
  private source: ByteSource;
  private reader: ChunkReader;
  private options: ResolvedOptions;

  private header: PngHeader | null = null;
  private palette: PaletteEntry[] = [];
  private sawPalette = false;
  private idatChunks: Uint8Array[] = [];
  private ancillary = new Map<number, PngChunk>();
  private chunkCount = 0;
  private consumed = false;

  constructor(source: ByteSource, options: PngParseOptions = {}) {
    this.source = source;
    this.options = resolveOptions(options);
    this.reader = new ChunkReader(source, { maxChunkLength: options.maxChunkLength });
  }

  /**
   * Validate the signature, then yield every chunk up to and including IEND.
   * Throws MissingImageEndError when the data runs out cleanly before IEND.
   */
  async *chunks(): AsyncGenerator<IndexedChunk> {
    if (this.consumed) {
      throw new Error('PngParser source has already been consumed');
    }
    this.consumed = true;

    const signature = await this.source.read(PNG_SIGNATURE.length);
    if (!isPngSignature(signature)) {
      throw new SignatureMismatchError();
    }

    let index = 0;
    while (true) {
      const result = await this.reader.readChunk();
      if (result.status === 'end') {
        throw new MissingImageEndError();
      }

      const current = index++;
      this.chunkCount = index;

      if (result.status === 'crc-mismatch') {
        const { chunk, computedCrc } = result;
        if (this.options.onCrcMismatch === 'throw' || isCriticalChunk(chunk.typeBytes)) {
          throw new CrcMismatchError(chunk.type, chunk.crc, computedCrc);
        }
        this.options.logger(`Skipping chunk ${chunk.type || '<non-ASCII>'} at index ${current}: CRC mismatch`);
        continue;
      }

      const { chunk } = result;
      this.options.onChunk?.(chunk, current);
      yield { chunk, index: current };

      if (chunk.type === 'IEND') {
        return;
      }
    }
  }

  /**
   * Read the whole container and inflate its image data
   */
  async parse(): Promise<DecodedPng> {
    // Normally 0; later only when skipped ancillary chunks came first
    let firstIndex: number | null = null;

    for await (const { chunk, index } of this.chunks()) {
      if (firstIndex === null) {
        firstIndex = index;
      }
      if (index === firstIndex && chunk.type !== 'IHDR') {
        this.handleMissingHeader(chunk);
      }

      switch (chunk.type) {
        case 'IHDR':
          this.handleHeader(chunk, index, index === firstIndex);
          break;
        case 'PLTE':
          this.handlePalette(chunk);
          break;
        case 'IDAT':
          this.idatChunks.push(chunk.data);
          break;
        case 'IEND':
          break;
        default:
          this.ancillary.set(index, chunk);
      }
    }

    return this.finish();
  }

  /**
   * Parse a 13-byte IHDR payload.
   *
   * In strict mode the payload length and every field are validated.
   * In lenient mode bytes past the end of the payload read as 0.
   */
  static parseHeader(chunk: PngChunk, validation: ValidationMode = 'strict'): PngHeader {
    if (chunk.type !== 'IHDR') {
      throw new InvalidHeaderError('Not an IHDR chunk');
    }

    const data = chunk.data;
    if (validation === 'strict' && data.length !== 13) {
      throw new InvalidHeaderError(`Invalid IHDR chunk length ${data.length}, expected 13`);
    }

    const uint32At = (offset: number): number =>
      offset + 4 <= data.length ? readUInt32BE(data, offset) : 0;
    const byteAt = (offset: number): number =>
      offset < data.length ? data[offset] : 0;

    const header: PngHeader = {
      width: uint32At(0),
      height: uint32At(4),
      bitDepth: byteAt(8),
      colorType: byteAt(9),
      compressionMethod: byteAt(10),
      filterMethod: byteAt(11),
      interlaceMethod: byteAt(12)
    };

    if (validation === 'strict') {
      validateHeader(header);
    }

    return header;
  }

  /**
   * Split a PLTE payload into RGB entries.
   *
   * Strict mode rejects a length that is not a positive multiple of 3 or
   * more than 256 entries; lenient mode drops a trailing partial entry.
   */
  static parsePalette(chunk: PngChunk, validation: ValidationMode = 'strict'): PaletteEntry[] {
    const data = chunk.data;

    if (validation === 'strict') {
      if (data.length === 0 || data.length % 3 !== 0) {
        throw new InvalidPaletteError(`PLTE length ${data.length} is not a positive multiple of 3`);
      }
      if (data.length / 3 > 256) {
        throw new InvalidPaletteError(`PLTE has ${data.length / 3} entries, maximum is 256`);
      }
    }

    const entries: PaletteEntry[] = [];
    for (let offset = 0; offset + 3 <= data.length; offset += 3) {
      entries.push({ r: data[offset], g: data[offset + 1], b: data[offset + 2] });
    }
    return entries;
  }

  private handleMissingHeader(chunk: PngChunk): void {
    if (this.options.validation === 'strict') {
      throw new MissingHeaderError(chunk.type);
    }
    this.options.logger(`First chunk is ${chunk.type || '<non-ASCII>'}, not IHDR; header fields default to 0`);
  }

  private handleHeader(chunk: PngChunk, index: number, isFirst: boolean): void {
    const { validation, logger } = this.options;

    if (!isFirst) {
      if (validation === 'strict') {
        throw new InvalidHeaderError(`IHDR must be the first chunk, found at index ${index}`);
      }
      logger(`IHDR at index ${index} is not the first chunk; kept as ancillary`);
      this.ancillary.set(index, chunk);
      return;
    }

    if (validation === 'lenient' && chunk.data.length !== 13) {
      logger(`IHDR payload is ${chunk.data.length} bytes, expected 13; missing fields read as 0`);
    }
    this.header = PngParser.parseHeader(chunk, validation);
  }

  private handlePalette(chunk: PngChunk): void {
    const { validation, logger } = this.options;

    if (validation === 'lenient') {
      if (chunk.data.length % 3 !== 0) {
        logger(`PLTE length ${chunk.data.length} is not a multiple of 3; trailing bytes ignored`);
      }
      this.palette.push(...PngParser.parsePalette(chunk, validation));
      this.sawPalette = true;
      return;
    }

    // Strict mode guarantees the header was read first
    const header = this.header ?? emptyHeader();
    if (this.sawPalette) {
      throw new InvalidPaletteError('Multiple PLTE chunks');
    }
    if (this.idatChunks.length > 0) {
      throw new InvalidPaletteError('PLTE must come before the first IDAT chunk');
    }
    if (header.colorType === ColorType.GRAYSCALE || header.colorType === ColorType.GRAYSCALE_ALPHA) {
      throw new InvalidPaletteError(`PLTE is not allowed for color type ${header.colorType}`);
    }

    const entries = PngParser.parsePalette(chunk, validation);
    if (header.colorType === ColorType.PALETTE && entries.length > 2 ** header.bitDepth) {
      throw new InvalidPaletteError(
        `PLTE has ${entries.length} entries, bit depth ${header.bitDepth} allows ${2 ** header.bitDepth}`
      );
    }

    this.palette = entries;
    this.sawPalette = true;
  }

  private async finish(): Promise<DecodedPng> {
    const header = this.header ?? emptyHeader();

    if (this.idatChunks.length === 0 || this.idatChunks.every((data) => data.length === 0)) {
      throw new EmptyImageDataError();
    }

    if (
      this.options.validation === 'strict' &&
      header.colorType === ColorType.PALETTE &&
      !this.sawPalette
    ) {
      throw new InvalidPaletteError('Indexed-color image has no PLTE chunk');
    }

    const compressed = concatBytes(this.idatChunks);
    let rawData: Uint8Array;
    try {
      rawData = await this.options.inflate(compressed);
    } catch (error) {
      throw error instanceof PngParseError ? error : new DecompressionError(error);
    }

    return {
      header,
      palette: this.palette,
      rawData,
      ancillary: this.ancillary,
      chunkCount: this.chunkCount,
      idatChunkCount: this.idatChunks.length
    };
  }
}

/**
 * Check IHDR fields against the values the PNG format defines
 */
export function validateHeader(header: PngHeader): void {
  if (header.width === 0 || header.width > MAX_DIMENSION) {
    throw new InvalidHeaderError(`Invalid image width ${header.width}`);
  }
  if (header.height === 0 || header.height > MAX_DIMENSION) {
    throw new InvalidHeaderError(`Invalid image height ${header.height}`);
  }

  const allowed = ALLOWED_BIT_DEPTHS.get(header.colorType);
  if (!allowed) {
    throw new InvalidHeaderError(`Unsupported PNG color type: ${header.colorType}`);
  }
  if (!allowed.includes(header.bitDepth)) {
    throw new InvalidHeaderError(
      `Bit depth ${header.bitDepth} is not allowed for color type ${header.colorType}`
    );
  }

  if (header.compressionMethod !== 0) {
    throw new InvalidHeaderError(`Unknown compression method ${header.compressionMethod}`);
  }
  if (header.filterMethod !== 0) {
    throw new InvalidHeaderError(`Unknown filter method ${header.filterMethod}`);
  }
  if (header.interlaceMethod !== 0 && header.interlaceMethod !== 1) {
    throw new InvalidHeaderError(`Unknown interlace method ${header.interlaceMethod}`);
  }
}

async function withSource<T>(input: ByteSourceInput, run: (source: ByteSource) => Promise<T>): Promise<T> {
  const source = createByteSource(input);
  try {
    return await run(source);
  } finally {
    // Caller-supplied sources stay open
    if (source !== input) {
      await source.close();
    }
  }
}

/**
 * Parse a PNG from a file path, buffer, byte stream or ByteSource
 */
export async function parsePng(input: ByteSourceInput, options: PngParseOptions = {}): Promise<DecodedPng> {
  return withSource(input, (source) => new PngParser(source, options).parse());
}

/**
 * Parse a PNG file from disk
 */
export async function parsePngFile(filePath: string, options: PngParseOptions = {}): Promise<DecodedPng> {
  return parsePng(filePath, options);
}

/**
 * Read only as far as the first chunk and return the image header
 */
export async function readPngHeader(input: ByteSourceInput, options: PngParseOptions = {}): Promise<PngHeader> {
  return withSource(input, async (source) => {
    const parser = new PngParser(source, options);
    for await (const { chunk } of parser.chunks()) {
      if (chunk.type === 'IHDR') {
        return PngParser.parseHeader(chunk, options.validation);
      }
      if (options.validation !== 'lenient') {
        throw new MissingHeaderError(chunk.type);
      }
      (options.logger ?? console.warn)(
        `First chunk is ${chunk.type || '<non-ASCII>'}, not IHDR; header fields default to 0`
      );
      return emptyHeader();
    }
    // chunks() throws rather than finishing without a chunk; kept for the return type
    throw new MissingImageEndError();
  });
}

/**
 * Yield the validated chunks of a PNG in file order, IEND included
 */
export async function* readPngChunks(
  input: ByteSourceInput,
  options: PngParseOptions = {}
): AsyncGenerator<PngChunk> {
  const source = createByteSource(input);
  try {
    for await (const { chunk } of new PngParser(source, options).chunks()) {
      yield chunk;
    }
  } finally {
    if (source !== input) {
      await source.close();
    }
  }
}
