import { hexToBytes } from '../../src/ByteBuffer';
import { xor } from '../../src/checksum/algorithms';
import { measureEncoded, measureValue } from '../../src/codecs/measure';
import { InsufficientDataError, SchemaOrderError } from '../../src/errors';
import { checksum } from '../../src/schema/checksum';
import { uint16, uint8 } from '../../src/schema/numeric';
import { padding } from '../../src/schema/padding';
import { array, bytes, consumer, text } from '../../src/schema/sequence';
import { layout, struct } from '../../src/schema/struct';

describe('measureValue', () => {
  it('sizes a value without its length fields set', () => {
    const root = layout([uint8('n'), text('s', 'n')]);
    expect(measureValue(root, { s: 'abc' })).toBe(4);
  });

  it('sums array elements, padding and checksum codes', () => {
    const root = layout([
      array('pts', struct('p', [uint8('x'), uint16('y')]), 2),
      padding(1),
      checksum('sum', xor(2), bytes('tail', 3)),
    ]);
    const value = { pts: [{ x: 1, y: 2 }, { x: 3, y: 4 }], tail: new Uint8Array([1]) };
    expect(measureValue(root, value)).toBe(6 + 1 + 2 + 3);
  });
});

describe('measureEncoded', () => {
  const root = layout([uint8('n'), text('s', 'n')]);

  it('reads only the bound length field', () => {
    expect(measureEncoded(root, hexToBytes('03616263ff'))).toBe(4);
  });

  it('honours an offset', () => {
    expect(measureEncoded(root, hexToBytes('ee0161'), 1)).toBe(2);
  });

  it('throws when the bytes run out', () => {
    expect(() => measureEncoded(root, hexToBytes('0561'))).toThrow(InsufficientDataError);
  });

  it('counts a consumer as everything left', () => {
    expect(measureEncoded(layout([uint8('a'), bytes('rest', consumer())]), hexToBytes('01020304'))).toBe(4);
  });

  it('needs an enclosing scope for a dynamic sequence', () => {
    expect(() => measureEncoded(bytes('d', 'n'), hexToBytes('00'))).toThrow(SchemaOrderError);
  });
});
