/**
 * @bfast/core — alignment arithmetic
 *
 * Every layout decision (offset table start, data start, each buffer start)
 * goes through these two functions. They are pure and total.
 */

import { ALIGNMENT } from './constants';

/** True iff `n` is a multiple of ALIGNMENT. */
export function isAligned(n: number): boolean {
  return n % ALIGNMENT === 0;
}

/**
 * Smallest multiple of ALIGNMENT that is >= n.
 * An already-aligned value is returned unchanged.
 */
export function alignedValue(n: number): number {
  if (isAligned(n)) return n;
  return n + ALIGNMENT - (n % ALIGNMENT);
}

/** Zero bytes needed after position `n` to reach the next aligned position. */
export function computePadding(n: number): number {
  return alignedValue(n) - n;
}
