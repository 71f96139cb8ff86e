/**
 * @bfast/core — BFastBuilder
 *
 * Collects named buffers one at a time, and lets a whole container be added
 * as a single buffer of another container:
 *
 *   const geometry = new BFastBuilder()
 *     .add('positions', new Float32Array(vertices))
 *     .add('indices',   new Uint32Array(faces));
 *
 *   const bytes = new BFastBuilder()
 *     .add('meta', header)
 *     .add('geometry', geometry)   // packed in place as one buffer
 *     .pack();
 *
 * Added buffers are borrowed, not copied: they are read when pack() runs.
 * size() answers the final stream length from the children's sizes alone,
 * without packing anything.
 */

import { toBytes } from './buffers';
import { encodeNames, validateName } from './names';
import { computeNeededSize, computeOffsets } from './offsets';
import { packRaw } from './pack';
import type { ByteSpan, NamedBuffer } from './types';

type BFastChild = ByteSpan | BFastBuilder;

interface Entry {
  readonly name:  string;
  readonly child: BFastChild;
}

export class BFastBuilder {
  private readonly entries: Entry[] = [];

  /** Number of buffers added so far. */
  get count(): number {
    return this.entries.length;
  }

  /**
   * Append a buffer, or a nested builder that is packed as one buffer.
   *
   * Throws BFastError('EmbeddedNullInName') for a name containing U+0000, and
   * TypeError when adding `child` would make a builder contain itself.
   */
  add(name: string, child: ArrayBufferView | BFastBuilder): this {
    validateName(name);

    if (child instanceof BFastBuilder) {
      if (child === this || child.contains(this)) {
        throw new TypeError(`BFastBuilder.add: '${name}' would nest a builder inside itself.`);
      }
      this.entries.push({ name, child });
    } else {
      this.entries.push({ name, child: toBytes(child) });
    }
    return this;
  }

  /** Append each named buffer in order. */
  addAll(buffers: readonly NamedBuffer[]): this {
    for (const b of buffers) this.add(b.name, b.data);
    return this;
  }

  /** Append `buffers` packed as a child container under `name`. */
  addNested(name: string, buffers: readonly NamedBuffer[]): this {
    return this.add(name, new BFastBuilder().addAll(buffers));
  }

  names(): string[] {
    return this.entries.map(e => e.name);
  }

  /** Byte length of each added buffer; a nested builder reports its size(). */
  sizes(): number[] {
    return this.entries.map(({ child }) =>
      child instanceof BFastBuilder ? child.size() : child.byteLength,
    );
  }

  /** Exact length of the stream pack() will return. */
  size(): number {
    if (this.entries.length === 0) return computeNeededSize([]);
    const nameTable = encodeNames(this.names());
    return computeNeededSize(computeOffsets([nameTable.byteLength, ...this.sizes()]));
  }

  /** Pack every buffer, packing nested builders first. */
  pack(): Uint8Array {
    if (this.entries.length === 0) return packRaw([]);

    return packRaw([
      encodeNames(this.names()),
      ...this.entries.map(({ child }) => child instanceof BFastBuilder ? child.pack() : child),
    ]);
  }

  private contains(target: BFastBuilder): boolean {
    return this.entries.some(({ child }) =>
      child instanceof BFastBuilder && (child === target || child.contains(target)),
    );
  }
}
