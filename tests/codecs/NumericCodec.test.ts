import { ByteBuffer } from '../../src/ByteBuffer';
import { decodeValue, encodeValue } from '../../src/codecs/dispatch';
import { InvalidSchemaError, ValueTypeError } from '../../src/errors';
import { float32, float64, int8, int16, int64, integer, uint16, uint32, uint64, uint8 } from '../../src/schema/numeric';
import type { Node } from '../../src/schema/types';
import type { Value } from '../../src/values';

function encodeHex(node: Node, value: Value): string {
  const buf = ByteBuffer.alloc();
  encodeValue(node, value, buf, '');
  return buf.toHex();
}

function decodeHex(node: Node, hex: string): Value {
  return decodeValue(node, ByteBuffer.from(Buffer.from(hex, 'hex')), '');
}

describe('numeric codec', () => {
  describe('byte order', () => {
    it('writes uint16 0x1234 big-endian by default', () => {
      expect(encodeHex(uint16('v'), 0x1234)).toBe('1234');
    });

    it('writes uint16 0x1234 little-endian', () => {
      expect(encodeHex(uint16('v', { byteOrder: 'little' }), 0x1234)).toBe('3412');
    });

    it('decodes with the configured order', () => {
      expect(decodeHex(uint32('v'), '00000102')).toBe(258);
      expect(decodeHex(uint32('v', { byteOrder: 'little' }), '02010000')).toBe(258);
    });

    it('native order matches one of the fixed orders', () => {
      const hex = encodeHex(uint16('v', { byteOrder: 'native' }), 0x1234);
      expect(['1234', '3412']).toContain(hex);
    });
  });

  describe('integers', () => {
    it('encodes negative values in two\'s complement', () => {
      expect(encodeHex(int8('v'), -1)).toBe('ff');
      expect(encodeHex(int16('v'), -2)).toBe('fffe');
      expect(decodeHex(int16('v'), 'fffe')).toBe(-2);
    });

    it('wraps out-of-range values to the field width', () => {
      expect(encodeHex(uint8('v'), 0x1ff)).toBe('ff');
      expect(encodeHex(uint8('v'), -1)).toBe('ff');
    });

    it('accepts bigint and decodes 8-byte fields as bigint', () => {
      expect(encodeHex(uint64('v'), 0x0102030405060708n)).toBe('0102030405060708');
      expect(decodeHex(uint64('v'), 'ffffffffffffffff')).toBe(18446744073709551615n);
      expect(decodeHex(int64('v'), 'ffffffffffffffff')).toBe(-1n);
    });

    it('rejects fractional numbers and non-numeric values', () => {
      expect(() => encodeHex(uint8('v'), 1.5)).toThrow(ValueTypeError);
      expect(() => encodeHex(uint8('v'), 'x')).toThrow('Expected number or bigint, got string');
    });

    it('requires a name', () => {
      expect(() => integer('', { width: 1 })).toThrow(InvalidSchemaError);
    });
  });

  describe('floats', () => {
    it('encodes float32 and float64 as IEEE 754', () => {
      expect(encodeHex(float32('v'), 1)).toBe('3f800000');
      expect(encodeHex(float64('v', { byteOrder: 'little' }), 1)).toBe('000000000000f03f');
    });

    it('decodes floats', () => {
      expect(decodeHex(float32('v'), '40490fdb')).toBeCloseTo(Math.PI, 6);
      expect(decodeHex(float64('v'), '3ff8000000000000')).toBe(1.5);
    });
  });
});
