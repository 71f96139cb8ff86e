/**
 * @bfast/core — errors and results
 *
 * Every validation failure is a BFastError carrying a `kind`, so callers can
 * branch on what went wrong without parsing messages. The try* entry points
 * return a BFastResult instead of throwing; anything that is not a BFastError
 * is a bug and still propagates.
 */

export type BFastErrorKind =
  | 'InvalidMagic'        // wrong magic, or magic written with the other byte order
  | 'InconsistentBounds'  // data_end < data_start
  | 'TruncatedStream'     // declared bytes lie past the end of the stream
  | 'NameTableMismatch'   // name count differs from num_arrays - 1
  | 'EmbeddedNullInName'  // a name passed to pack() contains U+0000
  | 'InvalidLayout';      // misaligned, overlapping or out-of-region offsets

export class BFastError extends Error {
  readonly kind: BFastErrorKind;

  constructor(kind: BFastErrorKind, message: string) {
    super(message);
    this.name = 'BFastError';
    this.kind = kind;
  }
}

export type BFastResult<T> =
  | { readonly ok: true;  readonly value: T }
  | { readonly ok: false; readonly error: BFastError };

/**
 * Run `fn`, capturing a BFastError as a failed result. Other exceptions are
 * rethrown untouched.
 */
export function attempt<T>(fn: () => T): BFastResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof BFastError) return { ok: false, error: e };
    throw e;
  }
}
