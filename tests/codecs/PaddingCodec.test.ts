import { PaddingMismatchError, InvalidSchemaError } from '../../src/errors';
import { LayoutCodec } from '../../src/schema/LayoutCodec';
import { uint8 } from '../../src/schema/numeric';
import { padding } from '../../src/schema/padding';
import { layout } from '../../src/schema/struct';

describe('padding', () => {
  const codec = new LayoutCodec(layout([uint8('a'), padding(2), uint8('b')]));

  it('writes zero bytes and exposes no value', () => {
    expect(codec.encodeToHex({ a: 1, b: 2 })).toBe('01000002');
    expect(codec.decodeFromHex('01000002')).toEqual({ a: 1, b: 2 });
  });

  it('verifies the filler on decode', () => {
    expect(() => codec.decodeFromHex('01000102')).toThrow(PaddingMismatchError);
  });

  it('accepts explicit filler bytes', () => {
    const filled = new LayoutCodec(layout([padding([0xaa, 0x55]), uint8('a')]));
    expect(filled.encodeToHex({ a: 7 })).toBe('aa5507');
  });

  it('rejects negative sizes', () => {
    expect(() => padding(-1)).toThrow(InvalidSchemaError);
  });

  it('rejects fill values that are not bytes', () => {
    expect(() => padding([0x1ff])).toThrow('Padding fill byte 0 must be an integer in 0..255, got 511');
    expect(() => padding([1, 1.5])).toThrow(InvalidSchemaError);
    expect(() => padding([-1])).toThrow(InvalidSchemaError);
  });

  it('cannot be changed after construction', () => {
    const fill = new Uint8Array([0xaa]);
    const node = padding(fill);
    fill[0] = 1;
    node.bytes[0] = 9;
    expect(node.bytes).toEqual(new Uint8Array([0xaa]));
    expect(new LayoutCodec(layout([node, uint8('a')])).encodeToHex({ a: 2 })).toBe('aa02');
  });
});
