/**
 * @bfast/core — header encoding and validation
 *
 * createHeader()  — derive the header fields from a computed offset table.
 * writeHeader()   — emit the 32 header bytes plus zero padding to byte 64.
 * readHeader()    — decode and validate the first 32 bytes of a stream.
 *
 * readHeader() checks only what the header can prove on its own: the magic
 * and data_start <= data_end. num_arrays is passed through untrusted; the
 * offset table reader decides whether the stream can actually hold that many
 * entries.
 */

import {
  BFAST_MAGIC,
  BFAST_SWAPPED_MAGIC,
  HEADER_SIZE,
  OFFSET_MAGIC,
  OFFSET_DATA_START,
  OFFSET_DATA_END,
  OFFSET_NUM_ARRAYS,
} from './constants';
import { BFastError } from './errors';
import type { BFastHeader, BufferOffset } from './types';
import type { ByteWriter } from './writer';

// ─── Internal helpers ─────────────────────────────────────────────────────────

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Narrow a u64 read from the stream to a number. Anything past 2^53 - 1 can't
 * address a byte of an in-memory stream, so it is reported as truncation.
 */
export function toSafeOffset(value: bigint, field: string): number {
  if (value > MAX_SAFE) {
    throw new BFastError(
      'TruncatedStream',
      `${field} (${value}) lies beyond any addressable stream length.`,
    );
  }
  return Number(value);
}

export function viewOf(stream: Uint8Array): DataView {
  return new DataView(stream.buffer, stream.byteOffset, stream.byteLength);
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/**
 * Header for a stream holding `offsets`. An empty offset table yields
 * data_start = data_end = 0.
 */
export function createHeader(offsets: readonly BufferOffset[]): BFastHeader {
  const first = offsets[0];
  const last  = offsets[offsets.length - 1];
  return {
    magic:     BFAST_MAGIC,
    dataStart: first === undefined ? 0 : first.begin,
    dataEnd:   last  === undefined ? 0 : last.end,
    numArrays: offsets.length,
  };
}

/**
 * Write the header fields in wire order, then pad to the offset table start.
 * The padding is written even though it carries nothing.
 */
export function writeHeader(writer: ByteWriter, header: BFastHeader): void {
  writer.writeU64(header.magic);
  writer.writeU64(header.dataStart);
  writer.writeU64(header.dataEnd);
  writer.writeU64(header.numArrays);
  writer.writePadding();
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Decode and validate the header at the start of `stream`.
 *
 * Throws BFastError:
 *   TruncatedStream     — fewer than 32 bytes, or a field past 2^53 - 1
 *   InvalidMagic        — magic is neither value, or is the swapped value
 *   InconsistentBounds  — data_end < data_start
 */
export function readHeader(stream: Uint8Array): BFastHeader {
  if (stream.byteLength < HEADER_SIZE) {
    throw new BFastError(
      'TruncatedStream',
      `Stream is ${stream.byteLength} bytes; the header alone needs ${HEADER_SIZE}.`,
    );
  }

  const dv    = viewOf(stream);
  const magic = dv.getBigUint64(OFFSET_MAGIC, true);

  if (magic === BFAST_SWAPPED_MAGIC) {
    throw new BFastError(
      'InvalidMagic',
      'Stream was written on a machine with the opposite byte order. ' +
      'Byte-swapped streams are not supported.',
    );
  }
  if (magic !== BFAST_MAGIC) {
    throw new BFastError(
      'InvalidMagic',
      `Invalid magic 0x${magic.toString(16)} (expected 0x${BFAST_MAGIC.toString(16)}). ` +
      'Not a BFAST stream.',
    );
  }

  const dataStart = dv.getBigUint64(OFFSET_DATA_START, true);
  const dataEnd   = dv.getBigUint64(OFFSET_DATA_END,   true);
  const numArrays = dv.getBigUint64(OFFSET_NUM_ARRAYS, true);

  if (dataEnd < dataStart) {
    throw new BFastError(
      'InconsistentBounds',
      `data_end (${dataEnd}) is before data_start (${dataStart}).`,
    );
  }

  return {
    magic,
    dataStart: toSafeOffset(dataStart, 'data_start'),
    dataEnd:   toSafeOffset(dataEnd,   'data_end'),
    numArrays: toSafeOffset(numArrays, 'num_arrays'),
  };
}
