/**
 * @bfast/core — name table
 *
 * Buffer names travel as logical buffer 0: the UTF-8 encoding of
 *
 *   name_0 \0 name_1 \0 ... name_{n-1} \0
 *
 * Every name, the last included, is terminated by a single 0x00 byte. The
 * name table gets no special treatment in the layout; it is aligned and padded
 * like any other buffer.
 */

import { BFastError } from './errors';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/** Throws BFastError('EmbeddedNullInName') if `name` contains U+0000. */
export function validateName(name: string): void {
  const at = name.indexOf('\0');
  if (at !== -1) {
    throw new BFastError(
      'EmbeddedNullInName',
      `Buffer name ${JSON.stringify(name)} contains a NUL character at index ${at}.`,
    );
  }
}

/** Encode names into a name table. Validates every name first. */
export function encodeNames(names: readonly string[]): Uint8Array {
  for (const name of names) validateName(name);
  return encoder.encode(names.map(n => `${n}\0`).join(''));
}

/**
 * Split a name table back into names.
 *
 * Throws BFastError('NameTableMismatch') if the table holds a different number
 * of terminated names than `expectedCount`, or has bytes after the last
 * terminator.
 */
export function decodeNames(bytes: Uint8Array, expectedCount: number): string[] {
  const names: string[] = [];
  let start = 0;

  while (start < bytes.byteLength) {
    const nul = bytes.indexOf(0, start);
    if (nul === -1) {
      throw new BFastError(
        'NameTableMismatch',
        `Name table has ${bytes.byteLength - start} unterminated bytes after name ${names.length}.`,
      );
    }
    names.push(decoder.decode(bytes.subarray(start, nul)));
    start = nul + 1;
  }

  if (names.length !== expectedCount) {
    throw new BFastError(
      'NameTableMismatch',
      `Name table holds ${names.length} names, but the stream has ${expectedCount} data buffers.`,
    );
  }

  return names;
}
