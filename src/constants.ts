/**
 * @bfast/core — layout constants
 *
 * These constants define the binary contract of a BFAST stream.
 * Any change to byte offsets or magic values breaks every reader
 * that has already been deployed.
 *
 * Every BFAST stream starts with a fixed 64-byte region:
 *
 *   [0..7]    magic        u64  = BFAST_MAGIC
 *   [8..15]   data_start   u64  — first byte of buffer data (64-aligned)
 *   [16..23]  data_end     u64  — one past the last byte of buffer data
 *   [24..31]  num_arrays   u64  — logical buffers, name table included
 *   [32..63]  zero padding
 *
 * followed by the offset table (16 bytes per logical buffer) and then the
 * buffers themselves, each starting on a 64-byte boundary. All integers are
 * little-endian.
 */

// ─── Magic & Version ──────────────────────────────────────────────────────────

/** Magic as read by a reader with the same byte order as the producer. */
export const BFAST_MAGIC: bigint = 0xbfa5n;

/**
 * Magic as read by a reader whose byte order differs from the producer's.
 * Seeing this value means the stream must be rejected; it is never byte-swapped.
 */
export const BFAST_SWAPPED_MAGIC: bigint = 0xa5bfn << 48n;

/** Version of the format implemented here. Informational only, not on the wire. */
export const BFAST_VERSION = {
  major:    1,
  minor:    0,
  revision: 1,
  date:     '2019.9.24',
} as const;

// ─── Header Layout ────────────────────────────────────────────────────────────

export const HEADER_SIZE = 32; // bytes

export const OFFSET_MAGIC      =  0; // u64
export const OFFSET_DATA_START =  8; // u64
export const OFFSET_DATA_END   = 16; // u64
export const OFFSET_NUM_ARRAYS = 24; // u64

/** One offset table entry: [begin: u64][end: u64]. */
export const OFFSET_ENTRY_SIZE = 16;

// ─── Alignment ────────────────────────────────────────────────────────────────

/** Wide enough for native 256-bit (and 512-bit) vector loads of buffer data. */
export const ALIGNMENT = 64;

/**
 * Byte offset of the offset table. Always alignedValue(HEADER_SIZE); kept as a
 * literal so readers never have to re-derive it.
 */
export const OFFSET_TABLE_START = 64;
