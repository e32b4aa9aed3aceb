import { FrameCodec, UnknownVariantError, type Logger } from 'struct-layout-ts';
import {
  InMemoryKeyValueStore,
  ProtocolError,
  Status,
  StorageClient,
  StorageHandler,
  StorageIOError,
  StoreResponseMessage,
  type KeyValueStore,
} from '../src';

class FailingStore implements KeyValueStore {
  async put(): Promise<void> {
    throw new StorageIOError('disk full');
  }

  async get(): Promise<Uint8Array> {
    throw new Error('boom');
  }
}

function mockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('StorageHandler with StorageClient', () => {
  function connect(store: KeyValueStore, logger?: Logger, firstTransaction?: number): StorageClient {
    const handler = new StorageHandler(store, { logger });
    return new StorageClient(frame => handler.handle(frame), { firstTransaction });
  }

  it('stores and fetches a value', async () => {
    const store = new InMemoryKeyValueStore();
    const client = connect(store);

    await expect(client.store('alpha', new Uint8Array([1, 2, 3]))).resolves.toEqual({
      trans: 0,
      name: 'alpha',
      status: Status.SUCCESS,
    });
    await expect(client.fetch('alpha')).resolves.toEqual({
      trans: 1,
      status: Status.SUCCESS,
      name: 'alpha',
      data: new Uint8Array([1, 2, 3]),
    });
    expect(store.size).toBe(1);
  });

  it('answers EKEY for a missing name', async () => {
    const client = connect(new InMemoryKeyValueStore());
    const reply = await client.fetch('missing');
    expect(reply.status).toBe(Status.EKEY);
    expect(reply.data).toEqual(new Uint8Array(0));
  });

  it('maps store failures to EIO and FAIL and logs them', async () => {
    const logger = mockLogger();
    const client = connect(new FailingStore(), logger);

    expect((await client.store('a', new Uint8Array([1]))).status).toBe(Status.EIO);
    expect((await client.fetch('a')).status).toBe(Status.FAIL);
    expect(logger.error).toHaveBeenCalledWith('[storage] store operation failed', {
      name: 'a',
      status: 'EIO',
      error: 'disk full',
    });
    expect(logger.error).toHaveBeenCalledWith('[storage] store operation failed', {
      name: 'a',
      status: 'FAIL',
      error: 'boom',
    });
  });

  it('wraps transaction ids after 255', async () => {
    const client = connect(new InMemoryKeyValueStore(), undefined, 255);
    expect((await client.store('a', new Uint8Array(0))).trans).toBe(255);
    expect((await client.store('a', new Uint8Array(0))).trans).toBe(0);
  });

  it('rejects frames that are not requests', async () => {
    const frames = new FrameCodec();
    const handler = new StorageHandler(new InMemoryKeyValueStore());
    const response = frames.encode(StoreResponseMessage, { trans: 0, name: 'a', status: Status.SUCCESS });
    await expect(handler.handle(response)).rejects.toThrow(UnknownVariantError);
  });
});

describe('StorageClient', () => {
  const frames = new FrameCodec();

  it('rejects a reply with another transaction id', async () => {
    const client = new StorageClient(async () =>
      frames.encode(StoreResponseMessage, { trans: 9, name: 'a', status: Status.SUCCESS }),
    );
    await expect(client.store('a', new Uint8Array(0))).rejects.toThrow(
      new ProtocolError('Expected transaction 0, got 9'),
    );
  });

  it('rejects a reply of the wrong type', async () => {
    const client = new StorageClient(async () =>
      frames.encode(StoreResponseMessage, { trans: 0, name: 'a', status: Status.SUCCESS }),
    );
    await expect(client.fetch('a')).rejects.toThrow(ProtocolError);
  });
});
