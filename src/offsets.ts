/**
 * @bfast/core — offset table
 *
 * Layout rule: buffers are placed in order, each starting at the first
 * aligned position after the previous buffer's last byte. The gaps are zero
 * padding. The first buffer starts at computeDataStart(count), i.e. after the
 * 64-byte header region and the aligned offset table.
 *
 * Offset table wire format (at OFFSET_TABLE_START, little-endian):
 *
 *   For each logical buffer (16 bytes):
 *     [begin: u64]   absolute, 64-aligned
 *     [end:   u64]   absolute, exclusive
 */

import { alignedValue, isAligned } from './alignment';
import { HEADER_SIZE, OFFSET_ENTRY_SIZE, OFFSET_TABLE_START } from './constants';
import { BFastError } from './errors';
import { toSafeOffset, viewOf } from './header';
import type { BFastHeader, BufferOffset } from './types';
import type { ByteWriter } from './writer';

// ─── Geometry ─────────────────────────────────────────────────────────────────

/** Byte offset at which buffer data begins for `count` logical buffers. */
export function computeDataStart(count: number): number {
  return alignedValue(alignedValue(HEADER_SIZE) + count * OFFSET_ENTRY_SIZE);
}

/** Place buffers of the given byte lengths, in order. */
export function computeOffsets(sizes: readonly number[]): BufferOffset[] {
  const offsets: BufferOffset[] = [];
  let cursor = computeDataStart(sizes.length);

  for (const size of sizes) {
    offsets.push({ begin: cursor, end: cursor + size });
    cursor = alignedValue(cursor + size);
  }

  return offsets;
}

/**
 * Total stream length for a computed offset table. The last buffer is not
 * followed by padding, so this is its end, not the next aligned position.
 */
export function computeNeededSize(offsets: readonly BufferOffset[]): number {
  const last = offsets[offsets.length - 1];
  return last === undefined ? computeDataStart(0) : last.end;
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/** Write every entry, then pad so the first buffer starts aligned. */
export function writeOffsetTable(writer: ByteWriter, offsets: readonly BufferOffset[]): void {
  for (const { begin, end } of offsets) {
    writer.writeU64(begin);
    writer.writeU64(end);
  }
  writer.writePadding();
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Read and validate `header.numArrays` entries from `stream`.
 *
 * `header` must already have passed readHeader(). Nothing past the offset
 * table is touched.
 *
 * Throws BFastError:
 *   TruncatedStream  — the header padding, the table, data_end, or an
 *                      entry's end lies past the stream; or an entry has
 *                      end < begin
 *   InvalidLayout    — misaligned data_start or begin, overlapping entries,
 *                      entries outside [data_start, data_end], last end
 *                      different from data_end, or non-zero bounds on an
 *                      empty container
 */
export function readOffsetTable(stream: Uint8Array, header: BFastHeader): BufferOffset[] {
  const { numArrays, dataStart, dataEnd } = header;

  const tableEnd = OFFSET_TABLE_START + numArrays * OFFSET_ENTRY_SIZE;
  if (stream.byteLength < tableEnd) {
    throw new BFastError(
      'TruncatedStream',
      `Offset table for ${numArrays} buffers ends at byte ${tableEnd}, ` +
      `but the stream is only ${stream.byteLength} bytes.`,
    );
  }

  if (numArrays === 0) {
    if (dataStart !== 0 || dataEnd !== 0) {
      throw new BFastError(
        'InvalidLayout',
        `Empty container must have data_start = data_end = 0, got ${dataStart}..${dataEnd}.`,
      );
    }
    return [];
  }

  if (dataEnd > stream.byteLength) {
    throw new BFastError(
      'TruncatedStream',
      `data_end (${dataEnd}) is past the end of the ${stream.byteLength}-byte stream.`,
    );
  }

  const minDataStart = computeDataStart(numArrays);
  if (!isAligned(dataStart) || dataStart < minDataStart) {
    throw new BFastError(
      'InvalidLayout',
      `data_start (${dataStart}) must be 64-byte aligned and at least ${minDataStart}.`,
    );
  }

  const dv = viewOf(stream);
  const offsets: BufferOffset[] = [];
  let floor = dataStart; // earliest legal begin for the next entry

  for (let i = 0; i < numArrays; i++) {
    const pos   = OFFSET_TABLE_START + i * OFFSET_ENTRY_SIZE;
    const begin = toSafeOffset(dv.getBigUint64(pos,     true), `offsets[${i}].begin`);
    const end   = toSafeOffset(dv.getBigUint64(pos + 8, true), `offsets[${i}].end`);

    if (begin > end || end > stream.byteLength) {
      throw new BFastError(
        'TruncatedStream',
        `offsets[${i}] = ${begin}..${end} does not fit in the ${stream.byteLength}-byte stream.`,
      );
    }
    if (!isAligned(begin)) {
      throw new BFastError('InvalidLayout', `offsets[${i}].begin (${begin}) is not 64-byte aligned.`);
    }
    if (begin < floor) {
      throw new BFastError(
        'InvalidLayout',
        `offsets[${i}].begin (${begin}) overlaps the data before it (next free byte ${floor}).`,
      );
    }
    if (end > dataEnd) {
      throw new BFastError(
        'InvalidLayout',
        `offsets[${i}].end (${end}) is past data_end (${dataEnd}).`,
      );
    }

    offsets.push({ begin, end });
    floor = alignedValue(end);
  }

  const last = offsets[offsets.length - 1];
  if (last !== undefined && last.end !== dataEnd) {
    throw new BFastError(
      'InvalidLayout',
      `Last buffer ends at ${last.end}, but data_end is ${dataEnd}.`,
    );
  }

  return offsets;
}
