import {
  FrameCodec,
  MessageRegistry,
  labelledLogger,
  route,
  silentLogger,
  type Logger,
} from 'struct-layout-ts';
import {
  FetchRequestMessage,
  FetchResponseMessage,
  StoreRequestMessage,
  StoreResponseMessage,
  type FetchRequest,
  type StoreRequest,
} from './messages';
import { Status, type StatusCode, statusName } from './status';
import { KeyNotFoundError, StorageIOError, type KeyValueStore } from './store';

export interface StorageHandlerOptions {
  frames?: FrameCodec;
  logger?: Logger;
}

/**
 * Serves storage request frames against a {@link KeyValueStore} and
 * answers each with the matching response frame.
 */
export class StorageHandler {
  private readonly _store: KeyValueStore;
  private readonly _frames: FrameCodec;
  private readonly _registry: MessageRegistry<void, Promise<Uint8Array>>;
  private readonly _logger: Logger;

  constructor(store: KeyValueStore, options: StorageHandlerOptions = {}) {
    this._store = store;
    this._logger = labelledLogger(options.logger ?? silentLogger, 'storage');
    this._frames = options.frames ?? new FrameCodec({ logger: options.logger });
    this._registry = new MessageRegistry<void, Promise<Uint8Array>>(
      [
        route(StoreRequestMessage, request => this.handleStore(request)),
        route(FetchRequestMessage, request => this.handleFetch(request)),
      ],
      { frames: this._frames, logger: options.logger },
    );
  }

  /** Decode one request frame and produce the response frame. */
  async handle(frame: Uint8Array): Promise<Uint8Array> {
    return this._registry.dispatch(frame, undefined);
  }

  private async handleStore(request: StoreRequest): Promise<Uint8Array> {
    let status: StatusCode = Status.SUCCESS;
    try {
      await this._store.put(request.name, request.data);
    } catch (err) {
      status = this.statusFor(err, request.name);
    }
    return this._frames.encode(StoreResponseMessage, { trans: request.trans, name: request.name, status });
  }

  private async handleFetch(request: FetchRequest): Promise<Uint8Array> {
    let status: StatusCode = Status.SUCCESS;
    let data: Uint8Array = new Uint8Array(0);
    try {
      data = await this._store.get(request.name);
    } catch (err) {
      status = this.statusFor(err, request.name);
    }
    return this._frames.encode(FetchResponseMessage, {
      trans: request.trans,
      status,
      name: request.name,
      data,
    });
  }

  private statusFor(err: unknown, name: string): StatusCode {
    let status: StatusCode = Status.FAIL;
    if (err instanceof KeyNotFoundError) status = Status.EKEY;
    else if (err instanceof StorageIOError) status = Status.EIO;
    this._logger.error('store operation failed', {
      name,
      status: statusName(status),
      error: err instanceof Error ? err.message : String(err),
    });
    return status;
  }
}
