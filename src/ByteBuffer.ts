import { InsufficientDataError } from './errors';

/**
 * Byte-level buffer for layout encoding/decoding.
 * Writes append to a growable byte array; reads consume from a cursor,
 * so the bytes after the cursor are the remainder still to be decoded.
 */
export class ByteBuffer {
  private _data: Uint8Array;
  private _view: DataView;
  private _length: number;
  private _offset: number;

  private constructor(data: Uint8Array, length: number, offset: number) {
    this._data = data;
    this._view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this._length = length;
    this._offset = offset;
  }

  /** Allocate a writable buffer with optional initial capacity. */
  static alloc(initialCapacity = 64): ByteBuffer {
    return new ByteBuffer(new Uint8Array(Math.max(initialCapacity, 1)), 0, 0);
  }

  /** Wrap existing bytes for reading. The bytes are not copied. */
  static from(data: Uint8Array): ByteBuffer {
    return new ByteBuffer(data, data.length, 0);
  }

  /** Number of valid bytes. */
  get length(): number {
    return this._length;
  }

  /** Current cursor position. */
  get offset(): number {
    return this._offset;
  }

  /** Bytes remaining from cursor to end. */
  get remaining(): number {
    return this._length - this._offset;
  }

  /** Throws {@link InsufficientDataError} unless `count` bytes can be read. */
  require(count: number, path?: string): void {
    if (count > this.remaining) {
      throw new InsufficientDataError(count, this.remaining, path);
    }
  }

  /** Write the low `width` bytes of an unsigned bit pattern. */
  writeUint(bits: bigint, width: number, littleEndian: boolean): void {
    this.ensureCapacity(this._length + width);
    const at = this._length;
    switch (width) {
      case 1:
        this._view.setUint8(at, Number(bits));
        break;
      case 2:
        this._view.setUint16(at, Number(bits), littleEndian);
        break;
      case 4:
        this._view.setUint32(at, Number(bits), littleEndian);
        break;
      case 8:
        this._view.setBigUint64(at, bits, littleEndian);
        break;
      default:
        throw new RangeError(`writeUint: unsupported width ${width}`);
    }
    this._length += width;
  }

  /** Read `width` bytes as an integer. 8-byte integers come back as bigint. */
  readInt(width: number, signed: boolean, littleEndian: boolean, path?: string): number | bigint {
    this.require(width, path);
    const at = this._offset;
    let value: number | bigint;
    switch (width) {
      case 1:
        value = signed ? this._view.getInt8(at) : this._view.getUint8(at);
        break;
      case 2:
        value = signed ? this._view.getInt16(at, littleEndian) : this._view.getUint16(at, littleEndian);
        break;
      case 4:
        value = signed ? this._view.getInt32(at, littleEndian) : this._view.getUint32(at, littleEndian);
        break;
      case 8:
        value = signed
          ? this._view.getBigInt64(at, littleEndian)
          : this._view.getBigUint64(at, littleEndian);
        break;
      default:
        throw new RangeError(`readInt: unsupported width ${width}`);
    }
    this._offset += width;
    return value;
  }

  writeFloat(value: number, width: 4 | 8, littleEndian: boolean): void {
    this.ensureCapacity(this._length + width);
    if (width === 4) {
      this._view.setFloat32(this._length, value, littleEndian);
    } else {
      this._view.setFloat64(this._length, value, littleEndian);
    }
    this._length += width;
  }

  readFloat(width: 4 | 8, littleEndian: boolean, path?: string): number {
    this.require(width, path);
    const value = width === 4
      ? this._view.getFloat32(this._offset, littleEndian)
      : this._view.getFloat64(this._offset, littleEndian);
    this._offset += width;
    return value;
  }

  /** Append raw bytes. */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(this._length + data.length);
    this._data.set(data, this._length);
    this._length += data.length;
  }

  /** Consume `count` bytes, returning a copy. */
  readBytes(count: number, path?: string): Uint8Array {
    this.require(count, path);
    const result = new Uint8Array(this._data.subarray(this._offset, this._offset + count));
    this._offset += count;
    return result;
  }

  /** Consume everything after the cursor. */
  readRest(): Uint8Array {
    return this.readBytes(this.remaining);
  }

  /** View of the unread bytes without moving the cursor. */
  peekRest(): Uint8Array {
    return this._data.subarray(this._offset, this._length);
  }

  /** Compact copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return hex string representation of the written bytes. */
  toHex(): string {
    return bytesToHex(this._data.subarray(0, this._length));
  }

  /** Reset cursor to 0. */
  reset(): void {
    this._offset = 0;
  }

  /** Seek to an absolute byte offset. */
  seek(offset: number): void {
    if (offset < 0 || offset > this._length) {
      throw new RangeError(`seek: offset ${offset} out of range [0, ${this._length}]`);
    }
    this._offset = offset;
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data.subarray(0, this._length));
    this._data = newData;
    this._view = new DataView(newData.buffer);
  }
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

/** Parse a hex string (whitespace ignored) into bytes. */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new RangeError(`Invalid hex string: '${hex}'`);
  }
  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}
