import type { ByteBuffer } from '../ByteBuffer';
import type { Node } from '../schema/types';
import type { Value, ValueMap } from '../values';
import { expectMap, getField, joinPath } from '../values';
import { decodeChecksum, encodeChecksum } from './ChecksumCodec';
import { decodeFloat, decodeInteger, encodeFloat, encodeInteger } from './NumericCodec';
import { decodePadding, encodePadding } from './PaddingCodec';
import { decodeSequence, encodeSequence } from './SequenceCodec';
import { decodeStruct, encodeStruct } from './StructCodec';

// ---------------------------------------------------------------------------
// Field level: nodes as members of an enclosing scope
// ---------------------------------------------------------------------------

/**
 * Encode `node` as a member of `scope`. Checksums and padding work on the
 * scope itself; every other node encodes the entry under its own name.
 */
export function encodeField(node: Node, scope: ValueMap, out: ByteBuffer, path: string): void {
  switch (node.kind) {
    case 'checksum':
      encodeChecksum(node, scope, out, path);
      return;
    case 'padding':
      encodePadding(node, out);
      return;
    default:
      encodeValue(node, getField(scope, node.name, path), out, joinPath(path, node.name));
  }
}

/** Decode `node` into `scope`, which holds the siblings decoded so far. */
export function decodeField(node: Node, input: ByteBuffer, scope: ValueMap, path: string): void {
  switch (node.kind) {
    case 'checksum':
      decodeChecksum(node, input, scope, path);
      return;
    case 'padding':
      decodePadding(node, input, path);
      return;
    default: {
      const fieldPath = joinPath(path, node.name);
      scope[node.name] = decodeValue(node, input, fieldPath, scope);
    }
  }
}

// ---------------------------------------------------------------------------
// Value level: nodes as roots or array elements
// ---------------------------------------------------------------------------

export function encodeValue(node: Node, value: Value, out: ByteBuffer, path: string): void {
  switch (node.kind) {
    case 'integer':
      encodeInteger(node, value, out, path);
      return;
    case 'float':
      encodeFloat(node, value, out, path);
      return;
    case 'sequence':
      encodeSequence(node, value, out, path);
      return;
    case 'struct':
      encodeStruct(node, value, out, path);
      return;
    case 'checksum':
      encodeChecksum(node, expectMap(value, path), out, path);
      return;
    case 'padding':
      encodePadding(node, out);
      return;
  }
}

/**
 * Decode one value. `scope` is the enclosing struct's partial value; only
 * Dynamic sequences read from it. A checksum or padding at value level
 * decodes into a mapping of its own.
 */
export function decodeValue(node: Node, input: ByteBuffer, path: string, scope?: ValueMap): Value {
  switch (node.kind) {
    case 'integer':
      return decodeInteger(node, input, path);
    case 'float':
      return decodeFloat(node, input, path);
    case 'sequence':
      return decodeSequence(node, input, path, scope);
    case 'struct':
      return decodeStruct(node, input, path);
    case 'checksum': {
      const own: ValueMap = {};
      decodeChecksum(node, input, own, path);
      return own;
    }
    case 'padding':
      decodePadding(node, input, path);
      return {};
  }
}
