/**
 * @bfast/core — NamedBuffer helpers
 *
 * Typed-array views, name pairing and lookup by name. None of these copy.
 */

import { describe, it, expect } from 'vitest';
import { namedBuffer, pack, toBufferMap, toBytes, toNamedBuffers, unpack } from '../src/index';

describe('NamedBuffer helpers', () => {
  it('toBytes() views a typed array without copying', () => {
    const ints  = new Int32Array([1, 2, 3]);
    const bytes = toBytes(ints);
    expect(bytes.byteLength).toBe(12);
    expect(bytes.buffer).toBe(ints.buffer);
  });

  it('toBytes() respects the view\'s byte offset', () => {
    const backing = new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7]);
    const view    = new DataView(backing.buffer, 2, 4);
    expect(Array.from(toBytes(view))).toEqual([2, 3, 4, 5]);
  });

  it('namedBuffer() round-trips typed array contents through pack/unpack', () => {
    const xs = new Float64Array([3, 4, 5]);
    const [out] = unpack(pack([namedBuffer('ys', xs)]));
    expect(out?.name).toBe('ys');
    expect(out?.data.byteLength).toBe(24);
    expect(Array.from(toBytes(xs))).toEqual(Array.from(out?.data ?? []));
  });

  it('toNamedBuffers() fills missing names with the empty string', () => {
    const named = toNamedBuffers([new Uint8Array([1]), new Uint8Array([2])], ['first']);
    expect(named.map(b => b.name)).toEqual(['first', '']);
    expect(named.map(b => Array.from(b.data))).toEqual([[1], [2]]);
  });

  it('toNamedBuffers() rejects more names than buffers', () => {
    expect(() => toNamedBuffers([new Uint8Array(1)], ['a', 'b'])).toThrow(RangeError);
  });

  it('toBufferMap() indexes buffers by name', () => {
    const map = toBufferMap([
      { name: 'a', data: new Uint8Array([1]) },
      { name: 'b', data: new Uint8Array([2, 2]) },
    ]);
    expect([...map.keys()]).toEqual(['a', 'b']);
    expect(map.get('b')?.byteLength).toBe(2);
  });

  it('toBufferMap() rejects duplicate names', () => {
    expect(() => toBufferMap([
      { name: 'a', data: new Uint8Array(0) },
      { name: 'a', data: new Uint8Array(0) },
    ])).toThrow(TypeError);
  });
});
