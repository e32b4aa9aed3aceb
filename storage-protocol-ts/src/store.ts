/** Raised by a store when no value exists under the requested name. */
export class KeyNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`No value stored under '${key}'`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/** Raised by a store when its backing medium fails. */
export class StorageIOError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageIOError';
  }
}

/** Capability the storage handler serves requests from. */
export interface KeyValueStore {
  put(name: string, data: Uint8Array): Promise<void>;
  /** @throws KeyNotFoundError when nothing is stored under `name` */
  get(name: string): Promise<Uint8Array>;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly _entries = new Map<string, Uint8Array>();

  async put(name: string, data: Uint8Array): Promise<void> {
    this._entries.set(name, data.slice());
  }

  async get(name: string): Promise<Uint8Array> {
    const data = this._entries.get(name);
    if (!data) {
      throw new KeyNotFoundError(name);
    }
    return data.slice();
  }

  get size(): number {
    return this._entries.size;
  }
}
