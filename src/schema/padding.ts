import { InvalidSchemaError } from '../errors';
import type { PaddingNode } from './types';

function fillBytes(fill: Uint8Array | readonly number[]): Uint8Array {
  if (!(fill instanceof Uint8Array)) {
    fill.forEach((b, i) => {
      if (!Number.isInteger(b) || b < 0 || b > 0xff) {
        throw new InvalidSchemaError(`Padding fill byte ${i} must be an integer in 0..255, got ${b}`);
      }
    });
  }
  return Uint8Array.from(fill);
}

/**
 * Filler bytes carrying no value. A number gives that many zero bytes.
 * Decoding verifies the bytes match.
 */
export function padding(fill: number | Uint8Array | readonly number[]): PaddingNode {
  let data: Uint8Array;
  if (typeof fill === 'number') {
    if (!Number.isInteger(fill) || fill < 0) {
      throw new InvalidSchemaError(`Padding size must be a non-negative integer, got ${fill}`);
    }
    data = new Uint8Array(fill);
  } else {
    data = fillBytes(fill);
  }
  // `bytes` returns a copy.
  return Object.freeze({
    kind: 'padding',
    name: '',
    get bytes(): Uint8Array {
      return data.slice();
    },
  });
}
