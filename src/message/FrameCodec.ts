import { InvalidSchemaError, LengthMismatchError, UnknownVariantError } from '../errors';
import type { Logger } from '../logger';
import { labelledLogger, silentLogger } from '../logger';
import { LayoutCodec } from '../schema/LayoutCodec';
import { uint16, uint8 } from '../schema/numeric';
import { struct } from '../schema/struct';
import type { IntegerNode, StructNode } from '../schema/types';
import { expectMap, getNumber } from '../values';
import type { MessageType } from './MessageType';

/** Frame header layout and the names of its id and payload length fields. */
export interface FrameHeaderLayout {
  layout: StructNode;
  idField: string;
  lengthField: string;
}

export interface FrameCodecOptions {
  header?: FrameHeaderLayout;
  logger?: Logger;
}

export interface FrameHeader {
  id: number;
  /** Declared payload length in bytes. */
  length: number;
}

export interface SplitFrame {
  header: FrameHeader;
  payload: Uint8Array;
}

/** `msg_id: uint8` followed by a big-endian `length: uint16`. */
export const defaultFrameHeader: FrameHeaderLayout = Object.freeze({
  layout: struct('header', [uint8('msg_id'), uint16('length')]),
  idField: 'msg_id',
  lengthField: 'length',
});

function headerField(header: FrameHeaderLayout, name: string): IntegerNode {
  const field = header.layout.children.find(c => c.name === name);
  if (!field || field.kind !== 'integer') {
    throw new InvalidSchemaError(`Frame header needs an integer field '${name}'`, header.layout.name);
  }
  return field;
}

function maxValue(field: IntegerNode): number {
  return Number(BigInt.asUintN(field.width * 8, -1n) >> (field.signed ? 1n : 0n));
}

/**
 * Frames message payloads as `header + payload`, where the header carries
 * the message id and the payload length.
 */
export class FrameCodec {
  private readonly _header: FrameHeaderLayout;
  private readonly _headerCodec: LayoutCodec;
  private readonly _maxId: number;
  private readonly _maxLength: number;
  private readonly _logger: Logger;

  constructor(options: FrameCodecOptions = {}) {
    this._header = options.header ?? defaultFrameHeader;
    this._maxId = maxValue(headerField(this._header, this._header.idField));
    this._maxLength = maxValue(headerField(this._header, this._header.lengthField));
    this._logger = labelledLogger(options.logger ?? silentLogger, 'frame');
    this._headerCodec = new LayoutCodec(this._header.layout, { strict: false });
  }

  /** Largest message id the header can carry. */
  get maxId(): number {
    return this._maxId;
  }

  /** Encode the payload first, then prepend a header carrying its length. */
  encode<T>(type: MessageType<T>, message: T): Uint8Array {
    if (type.id > this._maxId) {
      throw new InvalidSchemaError(`Message id ${type.id} does not fit the frame header`, type.name);
    }
    const payload = type.codec.encode(type.toValue(message));
    if (payload.length > this._maxLength) {
      throw new LengthMismatchError(
        `Payload of ${payload.length} byte(s) exceeds the frame limit of ${this._maxLength}`,
        type.name,
      );
    }
    const header = this._headerCodec.encode({
      [this._header.idField]: type.id,
      [this._header.lengthField]: payload.length,
    });
    const frame = new Uint8Array(header.length + payload.length);
    frame.set(header, 0);
    frame.set(payload, header.length);
    this._logger.debug('encoded frame', { id: type.id, name: type.name, length: payload.length });
    return frame;
  }

  /** Split a frame into header and payload. The payload must have exactly the declared length. */
  decodeHeader(frame: Uint8Array): SplitFrame {
    const { value, remainder } = this._headerCodec.decodePrefix(frame);
    const fields = expectMap(value, this._header.layout.name);
    const header: FrameHeader = {
      id: getNumber(fields, this._header.idField),
      length: getNumber(fields, this._header.lengthField),
    };
    if (remainder.length !== header.length) {
      throw new LengthMismatchError(
        `Frame declares ${header.length} payload byte(s) but carries ${remainder.length}`,
        this._header.layout.name,
      );
    }
    return { header, payload: remainder };
  }

  /** Decode a frame that must carry a message of `type`. */
  decodeAs<T>(type: MessageType<T>, frame: Uint8Array): T {
    const { header, payload } = this.decodeHeader(frame);
    if (header.id !== type.id) {
      throw new UnknownVariantError(`message id for ${type.name}`, header.id);
    }
    return this.decodePayload(type, payload);
  }

  /** Decode a payload already split off by {@link decodeHeader}. */
  decodePayload<T>(type: MessageType<T>, payload: Uint8Array): T {
    return type.fromValue(expectMap(type.codec.decode(payload), type.name));
  }
}
