/**
 * @bfast/core — NamedBuffer helpers
 *
 * Conveniences for building pack() input from typed arrays and for looking
 * unpacked buffers up by name. None of these copy bytes.
 */

import type { ByteSpan, NamedBuffer } from './types';

/** Byte view over any typed array or DataView, sharing its memory. */
export function toBytes(view: ArrayBufferView): ByteSpan {
  return new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
}

/**
 * Usage:
 *   pack([
 *     namedBuffer('positions', new Float32Array(vertices)),
 *     namedBuffer('indices',   new Uint32Array(faces)),
 *   ]);
 */
export function namedBuffer(name: string, data: ArrayBufferView): NamedBuffer {
  return { name, data: toBytes(data) };
}

/**
 * Pair buffers with names in order. Buffers without a name get `''`; more
 * names than buffers is a caller error.
 */
export function toNamedBuffers(
  buffers: readonly ArrayBufferView[],
  names:   readonly string[] = [],
): NamedBuffer[] {
  if (names.length > buffers.length) {
    throw new RangeError(
      `toNamedBuffers: ${names.length} names given for ${buffers.length} buffers.`,
    );
  }
  return buffers.map((b, i) => namedBuffer(names[i] ?? '', b));
}

/** Index buffers by name. Names must be unique. */
export function toBufferMap(buffers: readonly NamedBuffer[]): Map<string, ByteSpan> {
  const map = new Map<string, ByteSpan>();
  for (const { name, data } of buffers) {
    if (map.has(name)) {
      throw new TypeError(`toBufferMap: duplicate buffer name '${name}'.`);
    }
    map.set(name, data);
  }
  return map;
}
