import * as CRC32 from 'crc-32';
import { InvalidSchemaError } from '../errors';
import type { IntegerWidth } from '../schema/types';

/**
 * A pluggable integrity function. `compute` receives the exact bytes the
 * wrapped child encodes to; its result is stored as an unsigned integer of
 * `width` bytes.
 */
export interface ChecksumAlgorithm {
  readonly name: string;
  readonly width: IntegerWidth;
  compute(data: Uint8Array): number | bigint;
}

/**
 * XOR-fold over big-endian chunks of `width` bytes, seeded with all ones.
 * A trailing partial chunk is zero-padded on the right.
 */
export function xor(width: IntegerWidth): ChecksumAlgorithm {
  if (![1, 2, 4, 8].includes(width)) {
    throw new InvalidSchemaError(`XOR checksum width must be 1, 2, 4 or 8, got ${width}`);
  }
  const bits = width * 8;
  return Object.freeze({
    name: `xor${bits}`,
    width,
    compute(data: Uint8Array): number | bigint {
      let acc = BigInt.asUintN(bits, -1n);
      for (let i = 0; i < data.length; i += width) {
        let chunk = 0n;
        for (let j = 0; j < width; j++) {
          const byte = i + j < data.length ? data[i + j] : 0;
          chunk = (chunk << 8n) | BigInt(byte);
        }
        acc ^= chunk;
      }
      return width === 8 ? acc : Number(acc);
    },
  });
}

/** IEEE 802.3 CRC-32. */
export const crc32: ChecksumAlgorithm = Object.freeze({
  name: 'crc32',
  width: 4,
  compute: (data: Uint8Array): number => CRC32.buf(data) >>> 0,
});

/** Algorithms addressable by name from layout definitions and layout text. */
export const defaultAlgorithms: Readonly<Record<string, ChecksumAlgorithm>> = Object.freeze({
  xor8: xor(1),
  xor16: xor(2),
  xor32: xor(4),
  xor64: xor(8),
  crc32,
});

/** Compare a stored and a computed code as unsigned `width`-byte integers. */
export function sameChecksum(stored: number | bigint, computed: number | bigint, width: IntegerWidth): boolean {
  const bits = width * 8;
  return BigInt.asUintN(bits, BigInt(stored)) === BigInt.asUintN(bits, BigInt(computed));
}
