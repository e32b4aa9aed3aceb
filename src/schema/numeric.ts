import { InvalidSchemaError } from '../errors';
import type { ByteOrder, FloatNode, FloatWidth, IntegerNode, IntegerWidth } from './types';

export interface NumericOptions {
  /** Defaults to `'big'` (network order). */
  byteOrder?: ByteOrder;
}

export interface IntegerOptions extends NumericOptions {
  signed?: boolean;
  width: IntegerWidth;
}

export interface FloatOptions extends NumericOptions {
  width: FloatWidth;
}

const BYTE_ORDERS: readonly string[] = ['big', 'little', 'native'];

export function checkName(name: string, what: string): void {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidSchemaError(`${what} requires a non-empty name`);
  }
}

function checkByteOrder(order: string, name: string): void {
  if (!BYTE_ORDERS.includes(order)) {
    throw new InvalidSchemaError(`Unknown byte order '${order}'`, name);
  }
}

/** Fixed-width integer. Out-of-range values wrap to `width` bytes on encode. */
export function integer(name: string, options: IntegerOptions): IntegerNode {
  checkName(name, 'Integer field');
  const { width, signed = false, byteOrder = 'big' } = options;
  if (![1, 2, 4, 8].includes(width)) {
    throw new InvalidSchemaError(`Integer width must be 1, 2, 4 or 8, got ${width}`, name);
  }
  checkByteOrder(byteOrder, name);
  return Object.freeze({ kind: 'integer', name, signed, width, byteOrder });
}

/** IEEE 754 float of 4 or 8 bytes. */
export function float(name: string, options: FloatOptions): FloatNode {
  checkName(name, 'Float field');
  const { width, byteOrder = 'big' } = options;
  if (width !== 4 && width !== 8) {
    throw new InvalidSchemaError(`Float width must be 4 or 8, got ${width}`, name);
  }
  checkByteOrder(byteOrder, name);
  return Object.freeze({ kind: 'float', name, width, byteOrder });
}

export const int8 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: true, width: 1 });
export const int16 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: true, width: 2 });
export const int32 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: true, width: 4 });
export const int64 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: true, width: 8 });

export const uint8 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: false, width: 1 });
export const uint16 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: false, width: 2 });
export const uint32 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: false, width: 4 });
export const uint64 = (name: string, options?: NumericOptions): IntegerNode =>
  integer(name, { ...options, signed: false, width: 8 });

export const float32 = (name: string, options?: NumericOptions): FloatNode =>
  float(name, { ...options, width: 4 });
export const float64 = (name: string, options?: NumericOptions): FloatNode =>
  float(name, { ...options, width: 8 });
