/**
 * @bfast/core — unpacker
 *
 * Validation runs front to back and stops at the first failure:
 *
 *   header        → magic, data_start <= data_end
 *   offset table  → every entry inside the stream, aligned, non-overlapping
 *   name table    → exactly num_arrays - 1 terminated names
 *
 * No buffer byte is looked at until the offset table has been accepted, and
 * there is no best-effort mode: a stream is either fully valid or rejected.
 *
 * Returned spans borrow from the input stream unless `copy` is requested.
 */

import { attempt, type BFastResult } from './errors';
import { readHeader } from './header';
import { decodeNames } from './names';
import { readOffsetTable } from './offsets';
import type { BFastLayout, ByteSpan, NamedBuffer, UnpackOptions } from './types';

/** Read and validate the header and offset table of `stream`. */
export function readLayout(stream: ByteSpan): BFastLayout {
  const header  = readHeader(stream);
  const offsets = readOffsetTable(stream, header);
  return { header, offsets };
}

/**
 * Every logical buffer in `stream`, the name table included, as views into
 * the stream.
 */
export function unpackRaw(stream: ByteSpan): ByteSpan[] {
  const { offsets } = readLayout(stream);
  return offsets.map(o => stream.subarray(o.begin, o.end));
}

/**
 * Recover the named buffers from a BFAST stream, in packed order.
 *
 * Throws BFastError on any malformed input; see readHeader, readOffsetTable
 * and decodeNames for the individual error kinds.
 */
export function unpack(stream: ByteSpan, options: UnpackOptions = {}): NamedBuffer[] {
  const [nameTable, ...buffers] = unpackRaw(stream);
  if (nameTable === undefined) return [];

  const names = decodeNames(nameTable, buffers.length);
  const copy  = options.copy ?? false;

  return buffers.map((data, i) => ({
    name: names[i] ?? '',
    data: copy ? data.slice() : data,
  }));
}

/** unpack(), reporting validation failures as a result instead of throwing. */
export function tryUnpack(stream: ByteSpan, options?: UnpackOptions): BFastResult<NamedBuffer[]> {
  return attempt(() => unpack(stream, options));
}
