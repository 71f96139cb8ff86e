// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  ByteSpan,
  NamedBuffer,
  BufferOffset,
  BFastHeader,
  BFastLayout,
  UnpackOptions,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  BFAST_MAGIC,
  BFAST_SWAPPED_MAGIC,
  BFAST_VERSION,
  HEADER_SIZE,
  OFFSET_ENTRY_SIZE,
  OFFSET_TABLE_START,
  ALIGNMENT,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export { BFastError } from './errors';
export type { BFastErrorKind, BFastResult } from './errors';

// ─── Layout ───────────────────────────────────────────────────────────────────
export { isAligned, alignedValue, computePadding } from './alignment';
export {
  computeDataStart,
  computeOffsets,
  computeNeededSize,
  writeOffsetTable,
  readOffsetTable,
} from './offsets';
export { createHeader, writeHeader, readHeader } from './header';
export { validateName, encodeNames, decodeNames } from './names';
export { ByteWriter } from './writer';

// ─── Pack / Unpack ────────────────────────────────────────────────────────────
export { pack, packRaw, tryPack } from './pack';
export { unpack, unpackRaw, readLayout, tryUnpack } from './unpack';
export { BFastBuilder } from './builder';

// ─── Helpers ──────────────────────────────────────────────────────────────────
export { toBytes, namedBuffer, toNamedBuffers, toBufferMap } from './buffers';
