import { ByteBuffer, hexToBytes } from '../ByteBuffer';
import { decodeValue, encodeValue } from '../codecs/dispatch';
import { measureEncoded, measureValue } from '../codecs/measure';
import { LengthMismatchError, SchemaOrderError } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { Result } from '../result';
import { attempt } from '../result';
import type { Value } from '../values';
import { unboundSequences } from './analysis';
import type { Node } from './types';

export interface LayoutCodecOptions {
  logger?: Logger;
  /** Reject trailing bytes after a full decode. Defaults to true. */
  strict?: boolean;
}

export interface PrefixDecodeResult {
  value: Value;
  /** Number of bytes the value occupied. */
  consumed: number;
  /** Bytes following the value, not copied. */
  remainder: Uint8Array;
}

/**
 * High-level codec that wraps a layout.
 * Encodes value trees to Uint8Array and decodes Uint8Array back to value trees.
 */
export class LayoutCodec {
  private readonly _root: Node;
  private readonly _logger: Logger;
  private readonly _strict: boolean;

  constructor(root: Node, options: LayoutCodecOptions = {}) {
    const unbound = unboundSequences(root);
    if (unbound.length > 0) {
      throw new SchemaOrderError(
        `Root layout needs a sibling length field for '${unbound[0].name}'; wrap it in a struct`,
      );
    }
    this._root = root;
    this._logger = options.logger ?? silentLogger;
    this._strict = options.strict ?? true;
  }

  /**
   * Encode a value to a Uint8Array.
   *
   * Bound length fields and checksum codes are written into `value` while
   * encoding, and stay written if a later field fails.
   */
  encode(value: Value): Uint8Array {
    const buffer = ByteBuffer.alloc();
    encodeValue(this._root, value, buffer, '');
    this._logger.debug('encoded layout', { layout: this._root.name, bytes: buffer.length });
    return buffer.toUint8Array();
  }

  /** Encode a value and return hex string. */
  encodeToHex(value: Value): string {
    const buffer = ByteBuffer.alloc();
    encodeValue(this._root, value, buffer, '');
    return buffer.toHex();
  }

  /** Decode a complete payload. Trailing bytes are an error unless the codec is not strict. */
  decode(data: Uint8Array): Value {
    const { value, consumed, remainder } = this.decodePrefix(data);
    if (remainder.length > 0) {
      if (this._strict) {
        throw new LengthMismatchError(
          `${remainder.length} trailing byte(s) after ${consumed} decoded byte(s)`,
          this._root.name,
        );
      }
      this._logger.warn('ignoring trailing bytes', { layout: this._root.name, trailing: remainder.length });
    }
    return value;
  }

  /** Decode a hex string back to a value. */
  decodeFromHex(hex: string): Value {
    return this.decode(hexToBytes(hex));
  }

  /** Decode a value from the front of `data`, reporting what is left over. */
  decodePrefix(data: Uint8Array): PrefixDecodeResult {
    const buffer = ByteBuffer.from(data);
    const value = decodeValue(this._root, buffer, '');
    this._logger.debug('decoded layout', { layout: this._root.name, bytes: buffer.offset });
    return { value, consumed: buffer.offset, remainder: buffer.peekRest() };
  }

  /** Encoded size of `value`. */
  measure(value: Value): number {
    return measureValue(this._root, value);
  }

  /** Size of the encoded value at the front of `data`. */
  measureEncoded(data: Uint8Array): number {
    return measureEncoded(this._root, data);
  }

  tryEncode(value: Value): Result<Uint8Array> {
    return attempt(() => this.encode(value));
  }

  tryDecode(data: Uint8Array): Result<Value> {
    return attempt(() => this.decode(data));
  }

  /** The layout this codec was built from. */
  get root(): Node {
    return this._root;
  }
}
