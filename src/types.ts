/**
 * PNG chunk structure
 */
export interface PngChunk {
  /** Payload byte count as declared in the chunk frame */
  length: number;
  /**
   * Chunk type as text. Empty when the four tag bytes are not all ASCII
   * letters; the raw bytes are always available in `typeBytes`.
   */
  type: string;
  typeBytes: Uint8Array;
  data: Uint8Array;
  crc: number;
}

/**
 * PNG image header (IHDR) information
 */
export interface PngHeader {
  width: number;
  height: number;
  bitDepth: number;
  colorType: number;
  compressionMethod: number;
  filterMethod: number;
  interlaceMethod: number;
}

/**
 * One PLTE entry
 */
export interface PaletteEntry {
  r: number;
  g: number;
  b: number;
}

/**
 * Result of walking a PNG container to its IEND chunk
 */
export interface DecodedPng {
  header: PngHeader;
  palette: PaletteEntry[];
  /** Inflated IDAT stream: filtered scanlines, one filter byte per row */
  rawData: Uint8Array;
  /**
   * Chunks not interpreted by the parser, keyed by their position among all
   * chunks read. Map iteration order is the order they appeared in.
   */
  ancillary: Map<number, PngChunk>;
  /** Number of chunks read, IEND included */
  chunkCount: number;
  idatChunkCount: number;
}

/**
 * Decompression adapter: zlib-wrapped DEFLATE bytes in, inflated bytes out.
 * Rejects when the stream is corrupt or incomplete.
 */
export type Inflater = (compressed: Uint8Array) => Promise<Uint8Array>;

/**
 * Outcome of reading one chunk frame.
 *
 * `end` means the source was exhausted exactly at a chunk boundary.
 * `crc-mismatch` means the frame was complete, so the source is positioned
 * at the next chunk and the caller decides whether to continue.
 */
export type ChunkReadResult =
  | { status: 'chunk'; chunk: PngChunk }
  | { status: 'end' }
  | { status: 'crc-mismatch'; chunk: PngChunk; computedCrc: number };

/**
 * How structural problems in IHDR and PLTE are treated.
 * - 'strict': every violation throws a specific error
 * - 'lenient': missing header bytes read as zero, partial palette groups are
 *   dropped, a misplaced IHDR is kept as an ancillary chunk
 */
export type ValidationMode = 'strict' | 'lenient';

/**
 * What to do with a chunk whose CRC does not match.
 * Critical chunks always throw; 'skip-ancillary' drops bad ancillary chunks
 * with a warning and keeps reading.
 */
export type CrcMismatchPolicy = 'throw' | 'skip-ancillary';

/**
 * Options for the chunk reader
 */
export interface ChunkReaderOptions {
  /**
   * Largest payload length accepted before allocating (default and upper
   * bound: 2^31 - 1, the PNG limit)
   */
  maxChunkLength?: number;
}

/**
 * Options for parsing a PNG container
 */
export interface PngParseOptions extends ChunkReaderOptions {
  /** Default: 'strict' */
  validation?: ValidationMode;

  /** Default: 'throw' */
  onCrcMismatch?: CrcMismatchPolicy;

  /**
   * Decompresses the concatenated IDAT stream.
   * Default: `inflateData` (DecompressionStream, pako fallback)
   */
  inflate?: Inflater;

  /**
   * Sink for non-fatal diagnostics (skipped chunks, defaulted header bytes).
   * Default: console.warn
   */
  logger?: (message: string) => void;

  /**
   * Invoked for every chunk read, in file order, before it is classified.
   * Receives the chunk and its occurrence index.
   */
  onChunk?: (chunk: PngChunk, index: number) => void;
}

/**
 * PNG color types
 */
export enum ColorType {
  GRAYSCALE = 0,
  RGB = 2,
  PALETTE = 3,
  GRAYSCALE_ALPHA = 4,
  RGBA = 6
}
