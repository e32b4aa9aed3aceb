import { InvalidSchemaError, SchemaOrderError } from '../errors';
import { consumesRemainder, minimumSize, unboundSequences } from './analysis';
import { checkName } from './numeric';
import type { CountFunction, LengthPolicy, Node, SequenceNode } from './types';

/**
 * How a sequence learns its length:
 * a number is a static count, a string names a sibling length field,
 * or pass a policy built with {@link fixed}, {@link dynamic} or {@link consumer}.
 */
export type LengthSpec = number | string | LengthPolicy;

export interface ArrayOptions {
  /** Elements are stored on the wire in reverse order. */
  reverse?: boolean;
}

export interface BytesOptions {
  /** Bytes are stored on the wire in reverse order. */
  reverse?: boolean;
  /** Values are UTF-8 strings instead of Uint8Array. */
  text?: boolean;
}

/** Static length: always `count` elements (or bytes). */
export function fixed(count: number): LengthPolicy {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidSchemaError(`Static length must be a non-negative integer, got ${count}`);
  }
  return Object.freeze({ kind: 'static', count });
}

/**
 * Dynamic length: the count lives in the sibling integer field
 * `lengthField`, which must be declared earlier in the same struct.
 * `count` overrides how the count is derived from the value on encode.
 */
export function dynamic(lengthField: string, count?: CountFunction): LengthPolicy {
  checkName(lengthField, 'Dynamic length');
  return Object.freeze(count ? { kind: 'dynamic', lengthField, count } : { kind: 'dynamic', lengthField });
}

/** Consume everything left in the buffer. Must be the last field of its struct. */
export function consumer(): LengthPolicy {
  return Object.freeze({ kind: 'consumer' });
}

export function toLengthPolicy(spec: LengthSpec): LengthPolicy {
  if (typeof spec === 'number') return fixed(spec);
  if (typeof spec === 'string') return dynamic(spec);
  return spec;
}

/** A run of elements, each encoded with `element`'s layout. */
export function array(name: string, element: Node, length: LengthSpec, options: ArrayOptions = {}): SequenceNode {
  checkName(name, 'Array field');
  const policy = toLengthPolicy(length);

  if (unboundSequences(element).length > 0) {
    throw new SchemaOrderError('Array elements cannot use a Dynamic length (no sibling length field)', name);
  }
  if (consumesRemainder(element)) {
    throw new SchemaOrderError('Array elements cannot consume the remaining bytes', name);
  }
  if (policy.kind === 'consumer' && minimumSize(element) === 0) {
    throw new InvalidSchemaError('A consuming array needs elements of at least one byte', name);
  }

  return Object.freeze({
    kind: 'sequence',
    name,
    sequence: Object.freeze({ kind: 'array', element, reverse: options.reverse ?? false }),
    length: policy,
  });
}

/** Raw bytes, NUL-padded to the length (or exact, when consuming). */
export function bytes(name: string, length: LengthSpec, options: BytesOptions = {}): SequenceNode {
  checkName(name, 'Bytes field');
  return Object.freeze({
    kind: 'sequence',
    name,
    sequence: Object.freeze({
      kind: 'bytes',
      reverse: options.reverse ?? false,
      text: options.text ?? false,
    }),
    length: toLengthPolicy(length),
  });
}

/** UTF-8 text stored as bytes. */
export function text(name: string, length: LengthSpec, options: Omit<BytesOptions, 'text'> = {}): SequenceNode {
  return bytes(name, length, { ...options, text: true });
}
