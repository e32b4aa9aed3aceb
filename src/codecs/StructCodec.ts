import type { ByteBuffer } from '../ByteBuffer';
import { LengthMismatchError } from '../errors';
import type { IntegerNode, StructNode } from '../schema/types';
import type { Value, ValueMap } from '../values';
import { expectMap, getField, joinPath } from '../values';
import { decodeField, encodeField } from './dispatch';
import { encodeCount } from './SequenceCodec';

function maxUnsigned(node: IntegerNode): bigint {
  return BigInt.asUintN(node.width * 8, -1n) >> (node.signed ? 1n : 0n);
}

/**
 * Fill in every bound length field of `scope` from the sequences it sizes.
 * This writes into the caller's value, so a re-encode sees the same counts.
 */
export function writeBackLengths(node: StructNode, scope: ValueMap, path: string): void {
  for (const { lengthField, sequences } of node.bindings) {
    let count: number | undefined;
    for (const seq of sequences) {
      const seqPath = joinPath(path, seq.name);
      const next = encodeCount(seq, getField(scope, seq.name, path), seqPath);
      if (count !== undefined && next !== count) {
        throw new LengthMismatchError(
          `Sequences sharing length field '${lengthField.name}' disagree: ${count} vs ${next}`,
          seqPath,
        );
      }
      count = next;
    }
    if (count === undefined) continue;
    if (BigInt(count) > maxUnsigned(lengthField)) {
      throw new LengthMismatchError(
        `Count ${count} does not fit length field '${lengthField.name}'`,
        joinPath(path, lengthField.name),
      );
    }
    scope[lengthField.name] = count;
  }
}

export function encodeStruct(node: StructNode, value: Value, out: ByteBuffer, path: string): void {
  const scope = expectMap(value, path);
  writeBackLengths(node, scope, path);
  for (const child of node.children) {
    encodeField(child, scope, out, path);
  }
}

/** Children decode in order into a fresh scope, so later fields can read earlier ones. */
export function decodeStruct(node: StructNode, input: ByteBuffer, path: string): ValueMap {
  const scope: ValueMap = {};
  for (const child of node.children) {
    decodeField(child, input, scope, path);
  }
  return scope;
}
