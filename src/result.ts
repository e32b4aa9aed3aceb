import { CodecError } from './errors';

/** Outcome of a `try*` operation. Only {@link CodecError}s are captured. */
export type Result<T, E extends CodecError = CodecError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof CodecError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
