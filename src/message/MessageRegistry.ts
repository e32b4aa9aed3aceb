import { DuplicateVariantError, InvalidSchemaError, UnknownVariantError } from '../errors';
import type { Logger } from '../logger';
import { labelledLogger, silentLogger } from '../logger';
import { expectMap } from '../values';
import { FrameCodec } from './FrameCodec';
import type { MessageType } from './MessageType';

/**
 * A message type paired with its handler. The message type parameter is
 * captured by the closures so routes of different types share one registry.
 */
export interface MessageRoute<C, R> {
  readonly id: number;
  readonly name: string;
  decode(payload: Uint8Array): unknown;
  handle(payload: Uint8Array, context: C): R;
}

export interface DecodedMessage {
  id: number;
  name: string;
  message: unknown;
}

export interface MessageRegistryOptions {
  frames?: FrameCodec;
  logger?: Logger;
}

export function route<T, C, R>(type: MessageType<T>, handler: (message: T, context: C) => R): MessageRoute<C, R> {
  const decode = (payload: Uint8Array): T => type.fromValue(expectMap(type.codec.decode(payload), type.name));
  return {
    id: type.id,
    name: type.name,
    decode,
    handle: (payload, context) => handler(decode(payload), context),
  };
}

/**
 * Static id → message type table. Frames are decoded in two phases:
 * the header selects the route, then the payload is decoded with its layout.
 */
export class MessageRegistry<C = void, R = void> {
  private readonly _routes = new Map<number, MessageRoute<C, R>>();
  private readonly _frames: FrameCodec;
  private readonly _logger: Logger;

  constructor(routes: readonly MessageRoute<C, R>[], options: MessageRegistryOptions = {}) {
    this._frames = options.frames ?? new FrameCodec();
    this._logger = labelledLogger(options.logger ?? silentLogger, 'registry');
    for (const entry of routes) {
      const existing = this._routes.get(entry.id);
      if (existing) {
        throw new DuplicateVariantError(
          `Message id 0x${entry.id.toString(16)} is used by both '${existing.name}' and '${entry.name}'`,
        );
      }
      if (entry.id > this._frames.maxId) {
        throw new InvalidSchemaError(`Message id ${entry.id} does not fit the frame header`, entry.name);
      }
      this._routes.set(entry.id, entry);
    }
  }

  get frames(): FrameCodec {
    return this._frames;
  }

  /** Registered ids in ascending order. */
  get ids(): number[] {
    return [...this._routes.keys()].sort((a, b) => a - b);
  }

  lookup(id: number): MessageRoute<C, R> {
    const found = this._routes.get(id);
    if (!found) {
      this._logger.warn('unknown message id', { id });
      throw new UnknownVariantError('message id', id);
    }
    return found;
  }

  decode(frame: Uint8Array): DecodedMessage {
    const { header, payload } = this._frames.decodeHeader(frame);
    const entry = this.lookup(header.id);
    return { id: entry.id, name: entry.name, message: entry.decode(payload) };
  }

  /** Decode a frame and invoke the handler registered for its id. */
  dispatch(frame: Uint8Array, context: C): R {
    const { header, payload } = this._frames.decodeHeader(frame);
    const entry = this.lookup(header.id);
    this._logger.debug('dispatching message', { id: entry.id, name: entry.name });
    return entry.handle(payload, context);
  }
}
