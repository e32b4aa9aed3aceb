import type { ByteBuffer } from '../ByteBuffer';
import { LengthMismatchError, MissingFieldError, SchemaOrderError } from '../errors';
import type { SequenceNode } from '../schema/types';
import { CONSUME_ALL } from '../schema/types';
import type { Value, ValueMap } from '../values';
import { expectArray } from '../values';
import { decodeArray, encodeArray } from './ArrayCodec';
import { byteView, decodeBytes, encodeBytes } from './BytesCodec';

function checkCount(count: number, path: string): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new LengthMismatchError(`Invalid element count ${count}`, path);
  }
  return count;
}

/** Element count (or byte count) of a value as the sequence itself sees it. */
export function naturalCount(node: SequenceNode, value: Value, path: string): number {
  const { sequence } = node;
  return sequence.kind === 'bytes' ? byteView(sequence, value, path).length : expectArray(value, path).length;
}

/** Count to encode `value` with, or {@link CONSUME_ALL} for consumers. */
export function encodeCount(node: SequenceNode, value: Value, path: string): number {
  const { length } = node;
  switch (length.kind) {
    case 'static':
      return length.count;
    case 'dynamic':
      return checkCount(length.count ? length.count(value) : naturalCount(node, value, path), path);
    case 'consumer':
      return CONSUME_ALL;
  }
}

/**
 * Count to decode with. Dynamic sequences read their length field from
 * `scope`, the partially built value of the enclosing struct.
 */
export function decodeCount(node: SequenceNode, scope: ValueMap | undefined, path: string): number {
  const { length } = node;
  switch (length.kind) {
    case 'static':
      return length.count;
    case 'consumer':
      return CONSUME_ALL;
    case 'dynamic': {
      if (!scope) {
        throw new SchemaOrderError(`Dynamic sequence has no enclosing struct to read '${length.lengthField}' from`, path);
      }
      if (!Object.prototype.hasOwnProperty.call(scope, length.lengthField)) {
        throw new MissingFieldError(length.lengthField, path);
      }
      const raw = scope[length.lengthField];
      if (typeof raw !== 'number' && typeof raw !== 'bigint') {
        throw new LengthMismatchError(`Length field '${length.lengthField}' is not an integer`, path);
      }
      return checkCount(Number(raw), path);
    }
  }
}

export function encodeSequence(node: SequenceNode, value: Value, out: ByteBuffer, path: string): void {
  const count = encodeCount(node, value, path);
  if (node.sequence.kind === 'bytes') {
    encodeBytes(node.sequence, count, value, out, path);
  } else {
    encodeArray(node.sequence, count, value, out, path);
  }
}

export function decodeSequence(node: SequenceNode, input: ByteBuffer, path: string, scope?: ValueMap): Value {
  const count = decodeCount(node, scope, path);
  if (node.sequence.kind === 'bytes') {
    return decodeBytes(node.sequence, count, input, path);
  }
  return decodeArray(node.sequence, count, input, path);
}
