export {
  StoreRequestMessage,
  StoreResponseMessage,
  FetchRequestMessage,
  FetchResponseMessage,
  storageLayouts,
  STORAGE_LAYOUT_PATH,
} from './messages';
export type { StoreRequest, StoreResponse, FetchRequest, FetchResponse } from './messages';
export { Status, toStatus, statusName } from './status';
export type { StatusCode } from './status';
export { InMemoryKeyValueStore, KeyNotFoundError, StorageIOError } from './store';
export type { KeyValueStore } from './store';
export { StorageHandler } from './handler';
export type { StorageHandlerOptions } from './handler';
export { StorageClient, ProtocolError } from './client';
export type { StorageClientOptions, Transport } from './client';
