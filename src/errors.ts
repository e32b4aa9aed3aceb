export type CodecErrorKind =
  | 'MissingField'
  | 'InsufficientData'
  | 'LengthMismatch'
  | 'ChecksumMismatch'
  | 'PaddingMismatch'
  | 'DuplicateField'
  | 'SchemaOrder'
  | 'UnknownVariant'
  | 'DuplicateVariant'
  | 'ValueType'
  | 'InvalidSchema';

/**
 * Base class of every error raised by the library.
 * Callers can switch on `kind` instead of relying on `instanceof`.
 */
export class CodecError extends Error {
  readonly kind: CodecErrorKind;
  /** Dotted field path of the node that failed, when known. */
  readonly path?: string;

  constructor(kind: CodecErrorKind, message: string, path?: string) {
    super(path ? `${message} (at '${path}')` : message);
    this.kind = kind;
    this.path = path;
    this.name = this.constructor.name;
  }
}

export class MissingFieldError extends CodecError {
  readonly field: string;

  constructor(field: string, path?: string) {
    super('MissingField', `Missing value for field '${field}'`, path);
    this.field = field;
  }
}

export class InsufficientDataError extends CodecError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number, path?: string) {
    super('InsufficientData', `Need ${needed} byte(s), only ${available} available`, path);
    this.needed = needed;
    this.available = available;
  }
}

export class LengthMismatchError extends CodecError {
  constructor(message: string, path?: string) {
    super('LengthMismatch', message, path);
  }
}

export class ChecksumMismatchError extends CodecError {
  readonly expected: number | bigint;
  readonly actual: number | bigint;

  constructor(expected: number | bigint, actual: number | bigint, path?: string) {
    super(
      'ChecksumMismatch',
      `Checksum mismatch: stored 0x${expected.toString(16)}, computed 0x${actual.toString(16)}`,
      path,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class PaddingMismatchError extends CodecError {
  constructor(path?: string) {
    super('PaddingMismatch', 'Padding bytes differ from the declared filler', path);
  }
}

export class DuplicateFieldError extends CodecError {
  readonly field: string;

  constructor(field: string, path?: string) {
    super('DuplicateField', `Duplicate field name '${field}'`, path);
    this.field = field;
  }
}

export class SchemaOrderError extends CodecError {
  constructor(message: string, path?: string) {
    super('SchemaOrder', message, path);
  }
}

export class UnknownVariantError extends CodecError {
  readonly variant: string | number;

  constructor(what: string, variant: string | number) {
    const label = typeof variant === 'number' ? `0x${variant.toString(16)}` : `'${variant}'`;
    super('UnknownVariant', `Unknown ${what} ${label}`);
    this.variant = variant;
  }
}

export class DuplicateVariantError extends CodecError {
  constructor(message: string) {
    super('DuplicateVariant', message);
  }
}

export class ValueTypeError extends CodecError {
  constructor(expected: string, actual: unknown, path?: string) {
    super('ValueType', `Expected ${expected}, got ${describeValue(actual)}`, path);
  }
}

export class InvalidSchemaError extends CodecError {
  constructor(message: string, path?: string) {
    super('InvalidSchema', message, path);
  }
}

export function isCodecError(err: unknown): err is CodecError {
  return err instanceof CodecError;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Uint8Array) return 'Uint8Array';
  return typeof value;
}
