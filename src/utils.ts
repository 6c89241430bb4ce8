let crcTable: Uint32Array | null = null;

/**
 * CRC32 lookup table for PNG chunk validation, built on first use
 */
function getCrcTable(): Uint32Array {
  if (crcTable) {
    return crcTable;
  }

  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = (c & 1) ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c;
  }
  crcTable = table;
  return table;
}

/**
 * Feed bytes into a running CRC.
 * Seed with 0xffffffff and complement the final value to get the checksum.
 */
export function updateCrc32(crc: number, data: Uint8Array, start = 0, length = data.length - start): number {
  const table = getCrcTable();
  let c = crc;
  for (let i = start; i < start + length; i++) {
    c = table[(c ^ data[i]) & 0xff] ^ (c >>> 8);
  }
  return c >>> 0;
}

/**
 * Calculate CRC32 checksum for PNG chunk
 */
export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
  return (updateCrc32(0xffffffff, data, start, length) ^ 0xffffffff) >>> 0;
}

/**
 * CRC of a chunk as stored in the file: computed over type ‖ data
 */
export function chunkCrc(typeBytes: Uint8Array, data: Uint8Array): number {
  const crc = updateCrc32(updateCrc32(0xffffffff, typeBytes), data);
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Write a 32-bit big-endian unsigned integer
 */
export function writeUInt32BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

/**
 * Convert string to Uint8Array (ASCII)
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i);
  }
  return bytes;
}

/**
 * Convert Uint8Array to string (ASCII)
 */
export function bytesToString(bytes: Uint8Array, start = 0, length = bytes.length - start): string {
  let str = '';
  for (let i = start; i < start + length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

function isAsciiLetter(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

/**
 * Chunk type text for a 4-byte tag, or '' when the tag is not four ASCII letters
 */
export function chunkTypeToString(typeBytes: Uint8Array): string {
  if (typeBytes.length !== 4 || !typeBytes.every(isAsciiLetter)) {
    return '';
  }
  return bytesToString(typeBytes);
}

// Property bits live in bit 5 (lowercase) of each tag byte

/**
 * Critical chunks (uppercase first letter) must be understood by a decoder
 */
export function isCriticalChunk(typeBytes: Uint8Array): boolean {
  return (typeBytes[0] & 0x20) === 0;
}

export function isPublicChunk(typeBytes: Uint8Array): boolean {
  return (typeBytes[1] & 0x20) === 0;
}

export function isSafeToCopy(typeBytes: Uint8Array): boolean {
  return (typeBytes[3] & 0x20) !== 0;
}

/**
 * Concatenate byte arrays in order
 */
export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const totalLength = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/**
 * Verify PNG signature
 */
export function isPngSignature(data: Uint8Array): boolean {
  if (data.length < 8) return false;
  for (let i = 0; i < 8; i++) {
    if (data[i] !== PNG_SIGNATURE[i]) return false;
  }
  return true;
}
