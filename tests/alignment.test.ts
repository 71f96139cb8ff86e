/**
 * @bfast/core — alignment arithmetic
 */

import { describe, it, expect } from 'vitest';
import { ALIGNMENT, alignedValue, computePadding, isAligned } from '../src/index';

describe('alignment arithmetic', () => {
  it('uses a 64-byte alignment unit', () => {
    expect(ALIGNMENT).toBe(64);
  });

  it('isAligned() is true only for multiples of 64', () => {
    expect(isAligned(0)).toBe(true);
    expect(isAligned(64)).toBe(true);
    expect(isAligned(640)).toBe(true);
    expect(isAligned(1)).toBe(false);
    expect(isAligned(63)).toBe(false);
    expect(isAligned(65)).toBe(false);
  });

  it('alignedValue() rounds up to the next multiple of 64', () => {
    expect(alignedValue(1)).toBe(64);
    expect(alignedValue(32)).toBe(64);
    expect(alignedValue(65)).toBe(128);
    expect(alignedValue(127)).toBe(128);
  });

  it('alignedValue() leaves aligned values unchanged', () => {
    expect(alignedValue(0)).toBe(0);
    expect(alignedValue(64)).toBe(64);
    expect(alignedValue(4096)).toBe(4096);
  });

  it('computePadding() is the distance to the next aligned position', () => {
    expect(computePadding(0)).toBe(0);
    expect(computePadding(32)).toBe(32);
    expect(computePadding(65)).toBe(63);
    expect(computePadding(128)).toBe(0);
  });
});
