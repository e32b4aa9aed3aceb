import type { ByteBuffer } from '../ByteBuffer';
import type { BytesSequence } from '../schema/types';
import { CONSUME_ALL } from '../schema/types';
import { expectBytes, expectText, type Value } from '../values';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

/** Raw bytes of a bytes value, UTF-8 encoding it first for text sequences. */
export function byteView(seq: BytesSequence, value: Value, path: string): Uint8Array {
  return seq.text ? utf8Encoder.encode(expectText(value, path)) : expectBytes(value, path);
}

/** Largest cut at or below `limit` that does not split a UTF-8 sequence. */
function codePointBoundary(data: Uint8Array, limit: number): number {
  let end = limit;
  while (end > 0 && (data[end] & 0xc0) === 0x80) end--;
  return end;
}

/**
 * With a fixed count the value is truncated (text on a code point
 * boundary), reversed (when configured), then NUL-padded to `count`. Consuming sequences write the bytes as is.
 */
export function encodeBytes(seq: BytesSequence, count: number, value: Value, out: ByteBuffer, path: string): void {
  let data = byteView(seq, value, path);
  if (count !== CONSUME_ALL && data.length > count) {
    data = data.subarray(0, seq.text ? codePointBoundary(data, count) : count);
  }
  if (seq.reverse) {
    data = data.slice().reverse();
  }
  out.writeBytes(data);
  if (count !== CONSUME_ALL && data.length < count) {
    out.writeBytes(new Uint8Array(count - data.length));
  }
}

/** Inverse of {@link encodeBytes}: trailing NULs of a fixed count are stripped before un-reversing. */
export function decodeBytes(seq: BytesSequence, count: number, input: ByteBuffer, path: string): Value {
  let data = count === CONSUME_ALL ? input.readRest() : input.readBytes(count, path);
  if (count !== CONSUME_ALL) {
    let end = data.length;
    while (end > 0 && data[end - 1] === 0) end--;
    data = data.slice(0, end);
  }
  if (seq.reverse) {
    data.reverse();
  }
  return seq.text ? utf8Decoder.decode(data) : data;
}
