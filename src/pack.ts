/**
 * @bfast/core — packer
 *
 *   1. validate   — every name, before anything is allocated
 *   2. names      — build the name table (logical buffer 0)
 *   3. layout     — computeOffsets over [name table, ...buffers]
 *   4. write      — header, offset table, then each buffer at its offset
 *
 * The output is allocated once at its final size. Gaps are written as zero
 * padding, so the result is a byte-for-byte function of the input order and
 * contents. Input spans are only read.
 */

import { attempt, type BFastResult } from './errors';
import { createHeader, writeHeader } from './header';
import { encodeNames, validateName } from './names';
import { computeNeededSize, computeOffsets, writeOffsetTable } from './offsets';
import type { ByteSpan, NamedBuffer } from './types';
import { ByteWriter } from './writer';

/**
 * Pack logical buffers exactly as given. No name table is added; callers that
 * want unpack() to work must supply one as the first buffer.
 */
export function packRaw(buffers: readonly ByteSpan[]): Uint8Array {
  const offsets = computeOffsets(buffers.map(b => b.byteLength));
  const writer  = new ByteWriter(computeNeededSize(offsets));

  writeHeader(writer, createHeader(offsets));
  if (buffers.length === 0) return writer.finish();

  writeOffsetTable(writer, offsets);
  for (const buffer of buffers) {
    writer.writePadding();
    writer.writeBytes(buffer);
  }

  return writer.finish();
}

/**
 * Pack named buffers into a single BFAST stream.
 *
 * An empty list packs to a bare 64-byte header with num_arrays = 0 and no
 * name table.
 *
 * Throws BFastError('EmbeddedNullInName') if any name contains U+0000.
 */
export function pack(buffers: readonly NamedBuffer[]): Uint8Array {
  for (const b of buffers) validateName(b.name);
  if (buffers.length === 0) return packRaw([]);

  const nameTable = encodeNames(buffers.map(b => b.name));
  return packRaw([nameTable, ...buffers.map(b => b.data)]);
}

/** pack(), reporting validation failures as a result instead of throwing. */
export function tryPack(buffers: readonly NamedBuffer[]): BFastResult<Uint8Array> {
  return attempt(() => pack(buffers));
}
