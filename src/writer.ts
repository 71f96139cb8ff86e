/**
 * @bfast/core — ByteWriter
 *
 * The single sink every encoder writes through. Append-only: the cursor only
 * moves forward, and every byte between two writes is either written data or
 * explicit zero padding, so an encoded stream never contains stale memory.
 *
 * The packer pre-sizes the writer to the exact stream length, so in practice
 * it never grows. Growth exists so the header and offset-table encoders can be
 * used (and tested) on their own.
 */

import { computePadding } from './alignment';

const DEFAULT_CAPACITY = 256;

export class ByteWriter {
  private bytes:  Uint8Array;
  private view:   DataView;
  private cursor = 0;

  constructor(initialCapacity: number = DEFAULT_CAPACITY) {
    if (!Number.isSafeInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError(
        `ByteWriter: initialCapacity must be a non-negative integer, got ${initialCapacity}.`,
      );
    }
    this.bytes = new Uint8Array(initialCapacity);
    this.view  = new DataView(this.bytes.buffer);
  }

  /** Number of bytes written so far. */
  get position(): number {
    return this.cursor;
  }

  /** Append a copy of `src`. */
  writeBytes(src: Uint8Array): void {
    this.ensureCapacity(src.byteLength);
    this.bytes.set(src, this.cursor);
    this.cursor += src.byteLength;
  }

  /** Append one little-endian u64. */
  writeU64(value: number | bigint): void {
    const big = typeof value === 'bigint' ? value : BigInt(value);
    if (big < 0n || big > 0xffff_ffff_ffff_ffffn) {
      throw new RangeError(`ByteWriter: ${value} does not fit in a u64.`);
    }
    this.ensureCapacity(8);
    this.view.setBigUint64(this.cursor, big, /* littleEndian */ true);
    this.cursor += 8;
  }

  /** Append zero bytes until the position is a multiple of ALIGNMENT. */
  writePadding(): void {
    const n = computePadding(this.cursor);
    if (n === 0) return;
    this.ensureCapacity(n);
    this.bytes.fill(0, this.cursor, this.cursor + n);
    this.cursor += n;
  }

  /**
   * The bytes written so far. When the writer was sized exactly, this is the
   * backing array itself; otherwise a trimmed copy.
   */
  finish(): Uint8Array {
    return this.cursor === this.bytes.byteLength
      ? this.bytes
      : this.bytes.slice(0, this.cursor);
  }

  private ensureCapacity(extra: number): void {
    const needed = this.cursor + extra;
    if (needed <= this.bytes.byteLength) return;

    let capacity = Math.max(this.bytes.byteLength, DEFAULT_CAPACITY);
    while (capacity < needed) capacity *= 2;

    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.cursor));
    this.bytes = grown;
    this.view  = new DataView(grown.buffer);
  }
}
