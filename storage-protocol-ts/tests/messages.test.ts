import { FrameCodec, LengthMismatchError, UnknownVariantError } from 'struct-layout-ts';
import {
  FetchResponseMessage,
  StoreRequestMessage,
  Status,
  statusName,
  storageLayouts,
  toStatus,
} from '../src';

describe('storage messages', () => {
  const frames = new FrameCodec();

  it('compiles every layout from the layout file', () => {
    expect(Object.keys(storageLayouts)).toEqual(['StoreRequest', 'StoreResponse', 'FetchRequest', 'FetchResponse']);
  });

  it('frames a store request', () => {
    const frame = frames.encode(StoreRequestMessage, { trans: 7, name: 'k', data: new Uint8Array([0xaa]) });
    expect(Buffer.from(frame).toString('hex')).toBe('010006' + '07016b0001aa');
  });

  it('decodes a fetch response', () => {
    const frame = Buffer.from('040009' + '0500026162000201ff', 'hex');
    expect(frames.decodeAs(FetchResponseMessage, frame)).toEqual({
      trans: 5,
      status: Status.SUCCESS,
      name: 'ab',
      data: new Uint8Array([0x01, 0xff]),
    });
  });

  it('rejects names longer than the length field allows', () => {
    expect(() =>
      frames.encode(StoreRequestMessage, { trans: 0, name: 'x'.repeat(256), data: new Uint8Array(0) }),
    ).toThrow(LengthMismatchError);
  });
});

describe('status codes', () => {
  it('maps wire values to statuses', () => {
    expect(toStatus(0xff)).toBe(Status.FAIL);
    expect(statusName(toStatus(2))).toBe('EKEY');
  });

  it('rejects unknown values', () => {
    expect(() => toStatus(3)).toThrow(UnknownVariantError);
  });
});
