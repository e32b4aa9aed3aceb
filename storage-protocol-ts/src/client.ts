import { FrameCodec, type MessageType } from 'struct-layout-ts';
import {
  FetchRequestMessage,
  FetchResponseMessage,
  StoreRequestMessage,
  StoreResponseMessage,
  type FetchResponse,
  type StoreResponse,
} from './messages';

/** Sends one request frame and resolves with the response frame. */
export type Transport = (frame: Uint8Array) => Promise<Uint8Array>;

/** The peer answered with the wrong message type or transaction id. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export interface StorageClientOptions {
  frames?: FrameCodec;
  /** First transaction id. Ids wrap after 255. */
  firstTransaction?: number;
}

export class StorageClient {
  private readonly _transport: Transport;
  private readonly _frames: FrameCodec;
  private _nextTrans: number;

  constructor(transport: Transport, options: StorageClientOptions = {}) {
    this._transport = transport;
    this._frames = options.frames ?? new FrameCodec();
    this._nextTrans = (options.firstTransaction ?? 0) % 256;
  }

  async store(name: string, data: Uint8Array): Promise<StoreResponse> {
    const trans = this.takeTransaction();
    const reply = await this._transport(this._frames.encode(StoreRequestMessage, { trans, name, data }));
    return this.expectReply(StoreResponseMessage, reply, trans);
  }

  async fetch(name: string): Promise<FetchResponse> {
    const trans = this.takeTransaction();
    const reply = await this._transport(this._frames.encode(FetchRequestMessage, { trans, name }));
    return this.expectReply(FetchResponseMessage, reply, trans);
  }

  private takeTransaction(): number {
    const trans = this._nextTrans;
    this._nextTrans = (trans + 1) % 256;
    return trans;
  }

  private expectReply<T extends { trans: number }>(type: MessageType<T>, frame: Uint8Array, trans: number): T {
    const { header, payload } = this._frames.decodeHeader(frame);
    if (header.id !== type.id) {
      throw new ProtocolError(`Expected ${type.name} (0x${type.id.toString(16)}), got message id 0x${header.id.toString(16)}`);
    }
    const reply = this._frames.decodePayload(type, payload);
    if (reply.trans !== trans) {
      throw new ProtocolError(`Expected transaction ${trans}, got ${reply.trans}`);
    }
    return reply;
  }
}
