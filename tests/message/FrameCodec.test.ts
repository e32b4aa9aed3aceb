import { InvalidSchemaError, LengthMismatchError, UnknownVariantError } from '../../src/errors';
import { FrameCodec } from '../../src/message/FrameCodec';
import { defineMessage } from '../../src/message/MessageType';
import { uint16, uint8 } from '../../src/schema/numeric';
import { bytes, text } from '../../src/schema/sequence';
import { struct } from '../../src/schema/struct';
import { getBytes, getNumber, getText } from '../../src/values';

interface Ping {
  seq: number;
  note: string;
}

const PingMessage = defineMessage<Ping>({
  id: 0x10,
  name: 'Ping',
  layout: struct('Ping', [uint8('seq'), uint8('n'), text('note', 'n')]),
  fromValue: v => ({ seq: getNumber(v, 'seq'), note: getText(v, 'note') }),
  toValue: m => ({ seq: m.seq, note: m.note }),
});

const BlobMessage = defineMessage<Uint8Array>({
  id: 0x20,
  name: 'Blob',
  layout: struct('Blob', [uint16('n'), bytes('data', 'n')]),
  fromValue: v => getBytes(v, 'data'),
  toValue: data => ({ data }),
});

describe('FrameCodec', () => {
  const frames = new FrameCodec();

  it('prepends msg_id and a big-endian payload length', () => {
    const frame = frames.encode(PingMessage, { seq: 1, note: 'ok' });
    expect(Buffer.from(frame).toString('hex')).toBe('10000401026f6b');
  });

  it('splits header and payload', () => {
    const { header, payload } = frames.decodeHeader(new Uint8Array([0x10, 0, 2, 0xaa, 0xbb]));
    expect(header).toEqual({ id: 0x10, length: 2 });
    expect(payload).toEqual(new Uint8Array([0xaa, 0xbb]));
  });

  it('decodes a typed message', () => {
    const frame = frames.encode(PingMessage, { seq: 9, note: 'hi' });
    expect(frames.decodeAs(PingMessage, frame)).toEqual({ seq: 9, note: 'hi' });
  });

  it('decodes a payload split off by decodeHeader', () => {
    const { header, payload } = frames.decodeHeader(frames.encode(PingMessage, { seq: 3, note: 'yo' }));
    expect(header).toEqual({ id: 0x10, length: 4 });
    expect(frames.decodePayload(PingMessage, payload)).toEqual({ seq: 3, note: 'yo' });
  });

  it('rejects a payload of the wrong length', () => {
    expect(() => frames.decodeHeader(new Uint8Array([0x10, 0, 2, 0xaa]))).toThrow(LengthMismatchError);
    expect(() => frames.decodeHeader(new Uint8Array([0x10, 0, 2, 0xaa]))).toThrow(
      "Frame declares 2 payload byte(s) but carries 1 (at 'header')",
    );
  });

  it('rejects a frame of another type', () => {
    const frame = frames.encode(BlobMessage, new Uint8Array([1]));
    expect(() => frames.decodeAs(PingMessage, frame)).toThrow(UnknownVariantError);
  });

  describe('custom header', () => {
    const small = new FrameCodec({
      header: { layout: struct('h', [uint8('id'), uint8('len')]), idField: 'id', lengthField: 'len' },
    });

    it('uses the configured fields', () => {
      const frame = small.encode(BlobMessage, new Uint8Array([0xab]));
      expect(Buffer.from(frame).toString('hex')).toBe('2003' + '0001ab');
    });

    it('rejects payloads larger than the length field', () => {
      expect(() => small.encode(BlobMessage, new Uint8Array(300))).toThrow(
        'Payload of 302 byte(s) exceeds the frame limit of 255',
      );
    });

    it('requires integer id and length fields', () => {
      expect(
        () => new FrameCodec({ header: { layout: struct('h', [uint8('id')]), idField: 'id', lengthField: 'len' } }),
      ).toThrow(InvalidSchemaError);
    });
  });
});
