import { test } from 'node:test';
import assert from 'node:assert';
import { ChunkReader, MAX_CHUNK_LENGTH } from '../../src/chunk-reader.js';
import { BufferByteSource } from '../../src/byte-source.js';
import { createChunk, serializeChunk } from '../../src/png-writer.js';
import { ChunkTooLargeError, TruncatedChunkError } from '../../src/errors.js';
import { chunkCrc, concatBytes, stringToBytes, writeUInt32BE } from '../../src/utils.js';

function readerFor(...parts: Uint8Array[]): ChunkReader {
  return new ChunkReader(new BufferByteSource(concatBytes(parts)));
}

test('ChunkReader returns a chunk with identical fields and a reproducible CRC', async () => {
  const original = createChunk('tEXt', stringToBytes('Title\0Test'));
  const result = await readerFor(serializeChunk(original)).readChunk();

  assert.strictEqual(result.status, 'chunk');
  if (result.status !== 'chunk') return;
  const { chunk } = result;
  assert.strictEqual(chunk.length, 10);
  assert.strictEqual(chunk.type, 'tEXt');
  assert.deepStrictEqual(Array.from(chunk.typeBytes), Array.from(stringToBytes('tEXt')));
  assert.deepStrictEqual(Array.from(chunk.data), Array.from(original.data));
  assert.strictEqual(chunk.crc, original.crc);
  assert.strictEqual(chunkCrc(chunk.typeBytes, chunk.data), chunk.crc);
});

test('ChunkReader reads consecutive chunks then reports a clean end', async () => {
  const reader = readerFor(
    serializeChunk(createChunk('IDAT', new Uint8Array([1, 2, 3]))),
    serializeChunk(createChunk('IEND', new Uint8Array(0)))
  );

  const first = await reader.readChunk();
  const second = await reader.readChunk();
  const third = await reader.readChunk();

  assert.ok(first.status === 'chunk' && first.chunk.type === 'IDAT');
  assert.ok(second.status === 'chunk' && second.chunk.type === 'IEND');
  assert.strictEqual(second.chunk.length, 0);
  assert.deepStrictEqual(third, { status: 'end' });
});

test('ChunkReader reports end on an empty source', async () => {
  assert.deepStrictEqual(await readerFor().readChunk(), { status: 'end' });
});

test('ChunkReader flags a corrupted payload byte as a CRC mismatch', async () => {
  const payload = new Uint8Array([10, 20, 30, 40, 50]);
  const bytes = serializeChunk(createChunk('IDAT', payload));

  for (let i = 0; i < payload.length; i++) {
    const corrupted = bytes.slice();
    corrupted[8 + i] ^= 0x01;

    const result = await readerFor(corrupted).readChunk();

    assert.strictEqual(result.status, 'crc-mismatch', `payload byte ${i}`);
    if (result.status !== 'crc-mismatch') return;
    assert.notStrictEqual(result.computedCrc, result.chunk.crc);
  }
});

test('ChunkReader flags a corrupted type tag as a CRC mismatch', async () => {
  const bytes = serializeChunk(createChunk('tEXt', new Uint8Array([1])));
  bytes[4] = 'z'.charCodeAt(0);

  const result = await readerFor(bytes).readChunk();

  assert.strictEqual(result.status, 'crc-mismatch');
});

test('ChunkReader leaves the source at the next chunk after a CRC mismatch', async () => {
  const bad = serializeChunk(createChunk('tEXt', new Uint8Array([1, 2])));
  bad[bad.length - 1] ^= 0xff;
  const reader = readerFor(bad, serializeChunk(createChunk('IEND', new Uint8Array(0))));

  assert.strictEqual((await reader.readChunk()).status, 'crc-mismatch');
  const next = await reader.readChunk();
  assert.ok(next.status === 'chunk' && next.chunk.type === 'IEND');
});

test('ChunkReader throws TruncatedChunkError for a partial length field', async () => {
  await assert.rejects(
    () => readerFor(new Uint8Array([0, 0])).readChunk(),
    (error: unknown) =>
      error instanceof TruncatedChunkError &&
      error.field === 'length' &&
      error.expected === 4 &&
      error.received === 2 &&
      error.code === 'TRUNCATED_CHUNK'
  );
});

test('ChunkReader throws TruncatedChunkError at each field of a cut frame', async () => {
  const bytes = serializeChunk(createChunk('IDAT', new Uint8Array([1, 2, 3, 4])));
  const cases: Array<[number, string, number, number]> = [
    [6, 'type', 4, 2],
    [10, 'data', 4, 2],
    [14, 'crc', 4, 2]
  ];

  for (const [cut, field, expected, received] of cases) {
    await assert.rejects(
      () => readerFor(bytes.slice(0, cut)).readChunk(),
      (error: unknown) =>
        error instanceof TruncatedChunkError &&
        error.field === field &&
        error.expected === expected &&
        error.received === received,
      `cut at ${cut}`
    );
  }
});

test('ChunkReader rejects lengths above the configured limit before reading the payload', async () => {
  const lengthBytes = new Uint8Array(8);
  writeUInt32BE(lengthBytes, 1024, 0);
  lengthBytes.set(stringToBytes('IDAT'), 4);
  const reader = new ChunkReader(new BufferByteSource(lengthBytes), { maxChunkLength: 100 });

  await assert.rejects(() => reader.readChunk(), ChunkTooLargeError);
});

test('ChunkReader rejects lengths above the PNG maximum', async () => {
  const lengthBytes = new Uint8Array([0x80, 0, 0, 0]);
  const reader = new ChunkReader(new BufferByteSource(lengthBytes), { maxChunkLength: 0xffffffff });

  await assert.rejects(
    () => reader.readChunk(),
    (error: unknown) => error instanceof ChunkTooLargeError && error.length === MAX_CHUNK_LENGTH + 1
  );
});

test('ChunkReader keeps non-letter type tags as raw bytes', async () => {
  const typeBytes = new Uint8Array([0xc3, 0x28, 0x41, 0x42]);
  const result = await readerFor(serializeChunk(createChunk(typeBytes, new Uint8Array([7])))).readChunk();

  assert.strictEqual(result.status, 'chunk');
  if (result.status !== 'chunk') return;
  assert.strictEqual(result.chunk.type, '');
  assert.deepStrictEqual(Array.from(result.chunk.typeBytes), [0xc3, 0x28, 0x41, 0x42]);
});

test('ChunkReader chunk data does not alias the source buffer', async () => {
  const bytes = serializeChunk(createChunk('IDAT', new Uint8Array([5, 6])));
  const result = await new ChunkReader(new BufferByteSource(bytes)).readChunk();
  bytes.fill(0);

  assert.ok(result.status === 'chunk');
  assert.deepStrictEqual(Array.from(result.chunk.data), [5, 6]);
});
