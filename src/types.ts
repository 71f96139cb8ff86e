/**
 * @bfast/core — type definitions
 *
 * The bytes are the truth; these types are a lens onto them.
 */

// ─── Spans ────────────────────────────────────────────────────────────────────

/**
 * A borrowed view of `[byteOffset, byteOffset + byteLength)` in some
 * ArrayBuffer. Never owns the memory: whoever allocated the underlying buffer
 * must keep it alive (and unmodified) for as long as the span is used.
 */
export type ByteSpan = Uint8Array;

/**
 * The unit a caller hands to pack() and receives from unpack().
 *
 * `name` must not contain U+0000 — the NUL byte separates names inside the
 * name table.
 */
export interface NamedBuffer {
  readonly name: string;
  readonly data: ByteSpan;
}

// ─── Layout ───────────────────────────────────────────────────────────────────

/**
 * Location of one logical buffer, measured from the start of the stream.
 * `begin` is always a multiple of ALIGNMENT; `end - begin` is the exact
 * byte length of the buffer (trailing padding is not included).
 */
export interface BufferOffset {
  readonly begin: number;
  readonly end:   number;
}

/**
 * The fixed 32-byte header at the start of every stream.
 *
 * `magic` stays a bigint so that a swapped-endian value (0xA5BF << 48) can be
 * reported exactly. The remaining fields are converted to numbers once they
 * are known to address bytes within a JavaScript-sized buffer.
 */
export interface BFastHeader {
  readonly magic:     bigint;
  readonly dataStart: number;
  readonly dataEnd:   number;
  /** Logical buffers, name table included. */
  readonly numArrays: number;
}

/** A validated header together with its validated offset table. */
export interface BFastLayout {
  readonly header:  BFastHeader;
  readonly offsets: readonly BufferOffset[];
}

// ─── Options ──────────────────────────────────────────────────────────────────

export interface UnpackOptions {
  /**
   * Return owned copies instead of views into the stream. Use this when the
   * stream's memory will be reused or released before the buffers are done.
   * Defaults to false.
   */
  readonly copy?: boolean;
}
