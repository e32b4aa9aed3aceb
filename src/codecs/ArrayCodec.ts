import type { ByteBuffer } from '../ByteBuffer';
import { LengthMismatchError } from '../errors';
import type { ArraySequence } from '../schema/types';
import { CONSUME_ALL } from '../schema/types';
import { expectArray, joinPath, type Value } from '../values';
import { decodeValue, encodeValue } from './dispatch';

export function encodeArray(seq: ArraySequence, count: number, value: Value, out: ByteBuffer, path: string): void {
  let items = expectArray(value, path);
  if (count !== CONSUME_ALL && items.length !== count) {
    throw new LengthMismatchError(`Expected ${count} element(s), got ${items.length}`, path);
  }
  if (seq.reverse) {
    items = items.slice().reverse();
  }
  items.forEach((item, index) => encodeValue(seq.element, item, out, joinPath(path, index)));
}

/** Decode `count` elements, or elements until the buffer is exhausted. */
export function decodeArray(seq: ArraySequence, count: number, input: ByteBuffer, path: string): Value[] {
  const items: Value[] = [];
  if (count === CONSUME_ALL) {
    while (input.remaining > 0) {
      items.push(decodeValue(seq.element, input, joinPath(path, items.length)));
    }
  } else {
    for (let i = 0; i < count; i++) {
      items.push(decodeValue(seq.element, input, joinPath(path, i)));
    }
  }
  return seq.reverse ? items.reverse() : items;
}
