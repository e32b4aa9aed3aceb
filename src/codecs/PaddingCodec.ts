import type { ByteBuffer } from '../ByteBuffer';
import { PaddingMismatchError } from '../errors';
import type { PaddingNode } from '../schema/types';

export function encodePadding(node: PaddingNode, out: ByteBuffer): void {
  out.writeBytes(node.bytes);
}

/** Consume the filler and check it matches byte for byte. */
export function decodePadding(node: PaddingNode, input: ByteBuffer, path: string): void {
  const found = input.readBytes(node.bytes.length, path);
  if (found.some((b, i) => b !== node.bytes[i])) {
    throw new PaddingMismatchError(path);
  }
}
