import { endianness } from 'node:os';
import type { ByteBuffer } from '../ByteBuffer';
import { ValueTypeError } from '../errors';
import type { ByteOrder, FloatNode, IntegerNode } from '../schema/types';
import { expectNumeric, type Value } from '../values';

const NATIVE_LITTLE = endianness() === 'LE';

export function littleEndian(order: ByteOrder): boolean {
  return order === 'native' ? NATIVE_LITTLE : order === 'little';
}

/**
 * Fixed-width integer. Values outside the representable range wrap
 * to the low `width` bytes of their two's complement form.
 */
export function encodeInteger(node: IntegerNode, value: Value, out: ByteBuffer, path: string): void {
  const n = expectNumeric(value, path);
  if (typeof n === 'number' && !Number.isInteger(n)) {
    throw new ValueTypeError('integer', n, path);
  }
  const bits = BigInt.asUintN(node.width * 8, BigInt(n));
  out.writeUint(bits, node.width, littleEndian(node.byteOrder));
}

/** 1, 2 and 4-byte integers decode to number, 8-byte ones to bigint. */
export function decodeInteger(node: IntegerNode, input: ByteBuffer, path: string): number | bigint {
  return input.readInt(node.width, node.signed, littleEndian(node.byteOrder), path);
}

export function encodeFloat(node: FloatNode, value: Value, out: ByteBuffer, path: string): void {
  out.writeFloat(Number(expectNumeric(value, path)), node.width, littleEndian(node.byteOrder));
}

export function decodeFloat(node: FloatNode, input: ByteBuffer, path: string): number {
  return input.readFloat(node.width, littleEndian(node.byteOrder), path);
}
