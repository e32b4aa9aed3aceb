import { LayoutCodec } from '../../src/schema/LayoutCodec';
import {
  LengthMismatchError,
  InsufficientDataError,
  InvalidSchemaError,
  MissingFieldError,
  SchemaOrderError,
} from '../../src/errors';
import { uint16, uint8 } from '../../src/schema/numeric';
import { array, bytes, consumer, dynamic, text } from '../../src/schema/sequence';
import { layout, struct } from '../../src/schema/struct';
import type { ValueMap } from '../../src/values';

describe('sequence codec', () => {
  describe('static bytes', () => {
    it('NUL-pads short values and strips the padding on decode', () => {
      const codec = new LayoutCodec(text('s', 4));
      expect(codec.encodeToHex('ab')).toBe('61620000');
      expect(codec.decodeFromHex('61620000')).toBe('ab');
    });

    it('truncates long values', () => {
      const codec = new LayoutCodec(text('s', 2));
      expect(codec.encodeToHex('abcd')).toBe('6162');
    });

    it('truncates text on a code point boundary', () => {
      const codec = new LayoutCodec(text('s', 2));
      expect(codec.encodeToHex('a\u20ac')).toBe('6100');
      expect(codec.decodeFromHex('6100')).toBe('a');
      expect(new LayoutCodec(text('s', 4)).encodeToHex('a\u20ac')).toBe('61e282ac');
    });

    it('reverses after truncation and before padding', () => {
      const codec = new LayoutCodec(bytes('b', 4, { reverse: true }));
      expect(codec.encodeToHex(new Uint8Array([1, 2]))).toBe('02010000');
      expect(codec.decodeFromHex('02010000')).toEqual(new Uint8Array([1, 2]));
    });
  });

  describe('consuming bytes', () => {
    it('takes the whole remainder without padding processing', () => {
      const codec = new LayoutCodec(layout([uint8('a'), bytes('rest', consumer())]));
      expect(codec.decodeFromHex('01020000')).toEqual({ a: 1, rest: new Uint8Array([2, 0, 0]) });
    });

    it('reverses symmetrically', () => {
      const codec = new LayoutCodec(layout([bytes('rest', consumer(), { reverse: true })]));
      expect(codec.encodeToHex({ rest: new Uint8Array([1, 2, 3]) })).toBe('030201');
      expect(codec.decodeFromHex('030201')).toEqual({ rest: new Uint8Array([1, 2, 3]) });
    });
  });

  describe('static arrays', () => {
    it('encodes each element', () => {
      const codec = new LayoutCodec(array('xs', uint8('x'), 3));
      expect(codec.encodeToHex([1, 2, 3])).toBe('010203');
      expect(codec.decodeFromHex('010203')).toEqual([1, 2, 3]);
    });

    it('rejects a value with the wrong element count', () => {
      const codec = new LayoutCodec(array('xs', uint8('x'), 3));
      expect(() => codec.encode([1, 2])).toThrow(LengthMismatchError);
      expect(() => codec.encode([1, 2])).toThrow('Expected 3 element(s), got 2');
    });

    it('reverses element order', () => {
      const codec = new LayoutCodec(array('xs', uint8('x'), 3, { reverse: true }));
      expect(codec.encodeToHex([1, 2, 3])).toBe('030201');
      expect(codec.decodeFromHex('030201')).toEqual([1, 2, 3]);
    });

    it('encodes arrays of structs', () => {
      const point = struct('p', [uint8('x'), uint8('y')]);
      const codec = new LayoutCodec(array('points', point, 2));
      const value = [{ x: 1, y: 2 }, { x: 3, y: 4 }];
      expect(codec.encodeToHex(value)).toBe('01020304');
      expect(codec.decodeFromHex('01020304')).toEqual(value);
    });
  });

  describe('consuming arrays', () => {
    const codec = new LayoutCodec(layout([array('xs', uint16('x'), consumer())]));

    it('decodes elements until the buffer is exhausted', () => {
      expect(codec.decodeFromHex('00010002')).toEqual({ xs: [1, 2] });
    });

    it('fails on a partial trailing element', () => {
      expect(() => codec.decodeFromHex('000100')).toThrow(InsufficientDataError);
    });

    it('rejects elements that can encode to zero bytes', () => {
      expect(() => array('xs', struct('e', []), consumer())).toThrow(InvalidSchemaError);
    });

    it('rejects elements that need a sibling length field', () => {
      expect(() => array('xs', bytes('b', 'n'), 2)).toThrow(SchemaOrderError);
    });
  });

  describe('dynamic lengths', () => {
    it('writes the element count into the length field', () => {
      const codec = new LayoutCodec(layout([uint8('n'), array('xs', uint16('x'), 'n')]));
      const value: ValueMap = { xs: [5, 6] };
      expect(codec.encodeToHex(value)).toBe('0200050006');
      expect(value.n).toBe(2);
      expect(codec.decodeFromHex('0200050006')).toEqual({ n: 2, xs: [5, 6] });
    });

    it('overwrites a stale length value', () => {
      const codec = new LayoutCodec(layout([uint8('n'), array('xs', uint8('x'), 'n')]));
      const value: ValueMap = { n: 7, xs: [1, 2, 3] };
      expect(codec.encodeToHex(value)).toBe('03010203');
      expect(value.n).toBe(3);
    });

    it('keeps written lengths when a later field fails', () => {
      const codec = new LayoutCodec(layout([uint8('n'), bytes('d', 'n'), uint8('tail')]));
      const value: ValueMap = { n: 99, d: new Uint8Array([5]) };
      expect(() => codec.encode(value)).toThrow(MissingFieldError);
      expect(value.n).toBe(1);
    });

    it('uses a custom count function on encode', () => {
      const codec = new LayoutCodec(layout([uint8('n'), text('s', dynamic('n', () => 4))]));
      expect(codec.encodeToHex({ s: 'ab' })).toBe('0461620000');
      expect(codec.decodeFromHex('0461620000')).toEqual({ n: 4, s: 'ab' });
    });

    it('rejects a count that does not fit the length field', () => {
      const codec = new LayoutCodec(layout([uint8('n'), bytes('d', 'n')]));
      expect(() => codec.encode({ d: new Uint8Array(256) })).toThrow(LengthMismatchError);
      expect(() => codec.encode({ d: new Uint8Array(256) })).toThrow("Count 256 does not fit length field 'n' (at 'n')");
    });

    it('requires sequences sharing a length field to agree', () => {
      const codec = new LayoutCodec(layout([uint8('n'), bytes('a', 'n'), bytes('b', 'n')]));
      expect(codec.encodeToHex({ a: new Uint8Array([1, 2]), b: new Uint8Array([3, 4]) })).toBe('0201020304');
      expect(() => codec.encode({ a: new Uint8Array([1, 2]), b: new Uint8Array([3, 4, 5]) })).toThrow(
        LengthMismatchError,
      );
    });

    it('cannot be the root of a codec', () => {
      expect(() => new LayoutCodec(bytes('d', 'n'))).toThrow(SchemaOrderError);
    });
  });
});
