import { ByteBuffer } from '../ByteBuffer';
import { InsufficientDataError } from '../errors';
import type { Node, StructNode } from '../schema/types';
import { CONSUME_ALL } from '../schema/types';
import type { Value, ValueMap } from '../values';
import { expectArray, expectMap, getField, joinPath } from '../values';
import { byteView } from './BytesCodec';
import { decodeInteger } from './NumericCodec';
import { decodeCount, encodeCount } from './SequenceCodec';

// ---------------------------------------------------------------------------
// Size of a value about to be encoded
// ---------------------------------------------------------------------------

/** Numeric members are measured without looking them up, so unset length fields are fine. */
function measureField(node: Node, scope: ValueMap, path: string): number {
  switch (node.kind) {
    case 'integer':
    case 'float':
      return node.width;
    case 'checksum':
      return node.algorithm.width + measureField(node.child, scope, path);
    case 'padding':
      return node.bytes.length;
    default:
      return measureValue(node, getField(scope, node.name, path), joinPath(path, node.name));
  }
}

/** Number of bytes `value` encodes to, without encoding it. */
export function measureValue(node: Node, value: Value, path = ''): number {
  switch (node.kind) {
    case 'integer':
    case 'float':
      return node.width;
    case 'padding':
      return node.bytes.length;
    case 'sequence': {
      const count = encodeCount(node, value, path);
      const { sequence } = node;
      if (sequence.kind === 'bytes') {
        return count === CONSUME_ALL ? byteView(sequence, value, path).length : count;
      }
      return expectArray(value, path).reduce<number>(
        (sum, item, index) => sum + measureValue(sequence.element, item, joinPath(path, index)),
        0,
      );
    }
    case 'struct': {
      const scope = expectMap(value, path);
      return node.children.reduce((sum, child) => sum + measureField(child, scope, path), 0);
    }
    case 'checksum':
      return node.algorithm.width + measureField(node.child, expectMap(value, path), path);
  }
}

// ---------------------------------------------------------------------------
// Size of an already encoded value
// ---------------------------------------------------------------------------

function need(count: number, data: Uint8Array, offset: number, path: string): number {
  const available = data.length - offset;
  if (count > available) {
    throw new InsufficientDataError(count, Math.max(available, 0), path);
  }
  return count;
}

function isLengthField(node: StructNode, name: string): boolean {
  return node.bindings.some(b => b.lengthField.name === name);
}

/**
 * Number of bytes the encoded `node` occupies in `data` from `offset`.
 * Only the length fields that Dynamic sequences depend on are decoded;
 * `scope` supplies those of the enclosing struct.
 */
export function measureEncoded(
  node: Node,
  data: Uint8Array,
  offset = 0,
  scope?: ValueMap,
  path = '',
): number {
  switch (node.kind) {
    case 'integer':
    case 'float':
      return need(node.width, data, offset, path);
    case 'padding':
      return need(node.bytes.length, data, offset, path);
    case 'sequence': {
      const fieldPath = joinPath(path, node.name);
      const count = decodeCount(node, scope, fieldPath);
      if (count === CONSUME_ALL) return Math.max(data.length - offset, 0);
      const { sequence } = node;
      if (sequence.kind === 'bytes') return need(count, data, offset, fieldPath);
      let size = 0;
      for (let i = 0; i < count; i++) {
        size += measureEncoded(sequence.element, data, offset + size, undefined, joinPath(fieldPath, i));
      }
      return size;
    }
    case 'struct': {
      const structPath = joinPath(path, node.name);
      const local: ValueMap = {};
      let size = 0;
      for (const child of node.children) {
        const childSize = measureEncoded(child, data, offset + size, local, structPath);
        if (child.kind === 'integer' && isLengthField(node, child.name)) {
          const reader = ByteBuffer.from(data.subarray(offset + size));
          local[child.name] = decodeInteger(child, reader, joinPath(structPath, child.name));
        }
        size += childSize;
      }
      return size;
    }
    case 'checksum': {
      const width = need(node.algorithm.width, data, offset, joinPath(path, node.name));
      const childOffset = node.placement === 'prefix' ? offset + width : offset;
      const body = measureEncoded(node.child, data, childOffset, scope, path);
      if (node.placement === 'suffix') need(width, data, offset + body, joinPath(path, node.name));
      return width + body;
    }
  }
}
