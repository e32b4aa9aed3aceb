import { ByteBuffer } from '../ByteBuffer';
import { sameChecksum } from '../checksum/algorithms';
import { ChecksumMismatchError, LengthMismatchError } from '../errors';
import type { ChecksumNode } from '../schema/types';
import type { ValueMap } from '../values';
import { joinPath } from '../values';
import { decodeField, encodeField } from './dispatch';
import { measureEncoded } from './measure';
import { decodeInteger, encodeInteger } from './NumericCodec';

/**
 * Encode the child into a scratch buffer, compute its code and emit
 * code and body in the configured order. The computed code is written
 * into `scope` under the checksum's name.
 */
export function encodeChecksum(node: ChecksumNode, scope: ValueMap, out: ByteBuffer, path: string): void {
  const scratch = ByteBuffer.alloc();
  encodeField(node.child, scope, scratch, path);
  const body = scratch.toUint8Array();
  const code = node.algorithm.compute(body);
  scope[node.name] = code;

  const codePath = joinPath(path, node.name);
  if (node.placement === 'prefix') {
    encodeInteger(node.code, code, out, codePath);
    out.writeBytes(body);
  } else {
    out.writeBytes(body);
    encodeInteger(node.code, code, out, codePath);
  }
}

/**
 * Read the stored code and the child's bytes, verify the code over exactly
 * those bytes, then decode the child from them into `scope`.
 */
export function decodeChecksum(node: ChecksumNode, input: ByteBuffer, scope: ValueMap, path: string): void {
  const codePath = joinPath(path, node.name);
  let stored: number | bigint;
  let body: Uint8Array;
  if (node.placement === 'prefix') {
    stored = decodeInteger(node.code, input, codePath);
    body = input.readBytes(measureEncoded(node.child, input.peekRest(), 0, scope, path), path);
  } else {
    body = input.readBytes(measureEncoded(node.child, input.peekRest(), 0, scope, path), path);
    stored = decodeInteger(node.code, input, codePath);
  }

  const computed = node.algorithm.compute(body);
  if (!sameChecksum(stored, computed, node.algorithm.width)) {
    throw new ChecksumMismatchError(stored, computed, codePath);
  }

  const inner = ByteBuffer.from(body);
  decodeField(node.child, inner, scope, path);
  if (inner.remaining !== 0) {
    throw new LengthMismatchError(`${inner.remaining} checksummed byte(s) left undecoded`, path);
  }
  scope[node.name] = stored;
}
