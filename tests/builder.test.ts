/**
 * @bfast/core — BFastBuilder
 *
 * Incremental construction, size prediction before packing, and containers
 * nested as a single buffer of an outer container.
 *
 * Nested fixture:
 *
 *   inner  = { x: [7] }                         → 193 bytes
 *            name table "x\0"   128..130
 *            x                  192..193
 *
 *   outer  = { meta: [1], child: inner }        → 449 bytes
 *            name table "meta\0child\0"  128..139
 *            meta                        192..193
 *            child                       256..449
 */

import { describe, it, expect } from 'vitest';
import { BFastBuilder, BFastError, computeDataStart, pack, unpack } from '../src/index';
import type { BFastErrorKind, NamedBuffer } from '../src/index';

// ─── Shared helpers ────────────────────────────────────────────────────────────

function summarize(buffers: readonly NamedBuffer[]): Array<[string, number[]]> {
  return buffers.map((b): [string, number[]] => [b.name, Array.from(b.data)]);
}

function kindOf(fn: () => unknown): BFastErrorKind | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof BFastError) return e.kind;
    throw e;
  }
  return undefined;
}

function makeInner(): BFastBuilder {
  return new BFastBuilder().add('x', new Uint8Array([7]));
}

function makeOuter(): BFastBuilder {
  return new BFastBuilder()
    .add('meta', new Uint8Array([1]))
    .add('child', makeInner());
}

// ─── Flat containers ───────────────────────────────────────────────────────────

describe('BFastBuilder — flat', () => {
  it('packs the same bytes as pack() over the same buffers', () => {
    const built = new BFastBuilder()
      .add('a',  new Uint8Array([1, 2, 3]))
      .add('bb', new Uint8Array([9, 9]))
      .pack();

    expect(built).toEqual(pack([
      { name: 'a',  data: new Uint8Array([1, 2, 3]) },
      { name: 'bb', data: new Uint8Array([9, 9]) },
    ]));
  });

  it('predicts the packed size before packing', () => {
    const b = new BFastBuilder()
      .add('a',  new Uint8Array([1, 2, 3]))
      .add('bb', new Uint8Array([9, 9]));
    expect(b.size()).toBe(258);
    expect(b.pack().byteLength).toBe(258);
  });

  it('an empty builder packs to a bare header', () => {
    const b = new BFastBuilder();
    expect(b.count).toBe(0);
    expect(b.size()).toBe(computeDataStart(0));
    expect(unpack(b.pack())).toEqual([]);
  });

  it('accepts typed arrays and stores their bytes', () => {
    const b = new BFastBuilder().add('u16', new Uint16Array([0x0201]));
    expect(b.sizes()).toEqual([2]);
    expect(summarize(unpack(b.pack()))).toEqual([['u16', [0x01, 0x02]]]);
  });

  it('addAll() appends named buffers in order', () => {
    const b = new BFastBuilder().addAll([
      { name: 'p', data: new Uint8Array([1]) },
      { name: 'q', data: new Uint8Array([2]) },
    ]);
    expect(b.names()).toEqual(['p', 'q']);
    expect(summarize(unpack(b.pack()))).toEqual([['p', [1]], ['q', [2]]]);
  });

  it('size() follows buffers added after an earlier call', () => {
    const b = new BFastBuilder().add('a', new Uint8Array(3));
    const before = b.size();
    b.add('b', new Uint8Array(100));
    expect(b.size()).toBeGreaterThan(before);
    expect(b.size()).toBe(b.pack().byteLength);
  });

  it('rejects a name containing NUL when it is added', () => {
    expect(kindOf(() => new BFastBuilder().add('a\0', new Uint8Array(0)))).toBe('EmbeddedNullInName');
  });
});

// ─── Nested containers ─────────────────────────────────────────────────────────

describe('BFastBuilder — nested', () => {
  it('reports a nested builder by its packed size', () => {
    expect(makeInner().size()).toBe(193);
    expect(makeOuter().sizes()).toEqual([1, 193]);
    expect(makeOuter().size()).toBe(449);
    expect(makeOuter().pack().byteLength).toBe(449);
  });

  it('round-trips a child container through the outer buffer', () => {
    const outer = unpack(makeOuter().pack());
    expect(outer.map(b => b.name)).toEqual(['meta', 'child']);

    const child = outer[1];
    expect(child?.data.byteOffset).toBe(256);
    expect(summarize(unpack(child?.data ?? new Uint8Array(0)))).toEqual([['x', [7]]]);
  });

  it('addNested() packs named buffers as a child container', () => {
    const viaNested = new BFastBuilder()
      .add('meta', new Uint8Array([1]))
      .addNested('child', [{ name: 'x', data: new Uint8Array([7]) }])
      .pack();
    expect(viaNested).toEqual(makeOuter().pack());
  });

  it('refuses to nest a builder inside itself', () => {
    const b = new BFastBuilder();
    expect(() => b.add('self', b)).toThrow(TypeError);
  });

  it('refuses an indirect cycle', () => {
    const a = new BFastBuilder();
    const b = new BFastBuilder().add('a', a);
    expect(() => a.add('b', b)).toThrow(TypeError);
    expect(a.count).toBe(0);
  });
});
