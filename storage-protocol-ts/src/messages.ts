/**
 * Storage protocol message types.
 *
 * Layouts are compiled from `layouts/storage.layout`; each message type
 * pairs one of them with an id and adapters to a typed object.
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  UnknownVariantError,
  compileLayouts,
  defineMessage,
  getBytes,
  getNumber,
  getText,
  type StructNode,
} from 'struct-layout-ts';
import { type StatusCode, toStatus } from './status';

// ---------------------------------------------------------------------------
// Layouts
// ---------------------------------------------------------------------------

export const STORAGE_LAYOUT_PATH = path.join(__dirname, '..', 'layouts', 'storage.layout');

export const storageLayouts: Record<string, StructNode> = compileLayouts(
  fs.readFileSync(STORAGE_LAYOUT_PATH, 'utf-8'),
);

function layoutOf(name: string): StructNode {
  const found = storageLayouts[name];
  if (!found) {
    throw new UnknownVariantError('storage layout', name);
  }
  return found;
}

// ---------------------------------------------------------------------------
// Typed messages
// ---------------------------------------------------------------------------

export interface StoreRequest {
  trans: number;
  name: string;
  data: Uint8Array;
}

export interface StoreResponse {
  trans: number;
  name: string;
  status: StatusCode;
}

export interface FetchRequest {
  trans: number;
  name: string;
}

export interface FetchResponse {
  trans: number;
  status: StatusCode;
  name: string;
  data: Uint8Array;
}

export const StoreRequestMessage = defineMessage<StoreRequest>({
  id: 0x01,
  name: 'StoreRequest',
  layout: layoutOf('StoreRequest'),
  fromValue: v => ({ trans: getNumber(v, 'trans'), name: getText(v, 'name'), data: getBytes(v, 'data') }),
  toValue: m => ({ trans: m.trans, name: m.name, data: m.data }),
});

export const StoreResponseMessage = defineMessage<StoreResponse>({
  id: 0x02,
  name: 'StoreResponse',
  layout: layoutOf('StoreResponse'),
  fromValue: v => ({
    trans: getNumber(v, 'trans'),
    name: getText(v, 'name'),
    status: toStatus(getNumber(v, 'status')),
  }),
  toValue: m => ({ trans: m.trans, name: m.name, status: m.status }),
});

export const FetchRequestMessage = defineMessage<FetchRequest>({
  id: 0x03,
  name: 'FetchRequest',
  layout: layoutOf('FetchRequest'),
  fromValue: v => ({ trans: getNumber(v, 'trans'), name: getText(v, 'name') }),
  toValue: m => ({ trans: m.trans, name: m.name }),
});

export const FetchResponseMessage = defineMessage<FetchResponse>({
  id: 0x04,
  name: 'FetchResponse',
  layout: layoutOf('FetchResponse'),
  fromValue: v => ({
    trans: getNumber(v, 'trans'),
    status: toStatus(getNumber(v, 'status')),
    name: getText(v, 'name'),
    data: getBytes(v, 'data'),
  }),
  toValue: m => ({ trans: m.trans, status: m.status, name: m.name, data: m.data }),
});
