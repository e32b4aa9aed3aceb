import { MissingFieldError, ValueTypeError } from './errors';

export type Scalar = number | bigint | string | Uint8Array;

/** A value tree mirroring a node tree: scalars, sequences and scoped mappings. */
export type Value = Scalar | Value[] | ValueMap;

export interface ValueMap {
  [name: string]: Value;
}

export function isValueMap(value: unknown): value is ValueMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

export function joinPath(path: string, name: string | number): string {
  if (typeof name === 'number') return `${path}[${name}]`;
  if (!name) return path;
  return path ? `${path}.${name}` : name;
}

export function expectMap(value: Value, path: string): ValueMap {
  if (!isValueMap(value)) throw new ValueTypeError('mapping', value, path);
  return value;
}

export function expectArray(value: Value, path: string): Value[] {
  if (!Array.isArray(value)) throw new ValueTypeError('array', value, path);
  return value;
}

export function expectNumeric(value: Value, path: string): number | bigint {
  if (typeof value === 'number' || typeof value === 'bigint') return value;
  throw new ValueTypeError('number or bigint', value, path);
}

export function expectBytes(value: Value, path: string): Uint8Array {
  if (value instanceof Uint8Array) return value;
  throw new ValueTypeError('Uint8Array', value, path);
}

export function expectText(value: Value, path: string): string {
  if (typeof value === 'string') return value;
  throw new ValueTypeError('string', value, path);
}

/** Look up a named entry, raising {@link MissingFieldError} when absent. */
export function getField(scope: ValueMap, name: string, path = ''): Value {
  if (!Object.prototype.hasOwnProperty.call(scope, name)) {
    throw new MissingFieldError(name, joinPath(path, name));
  }
  return scope[name];
}

// ---------------------------------------------------------------------------
// Typed accessors for adapters turning value trees into domain objects
// ---------------------------------------------------------------------------

export function getNumber(scope: ValueMap, name: string): number {
  const value = getField(scope, name);
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number') return value;
  throw new ValueTypeError('number', value, name);
}

export function getBigInt(scope: ValueMap, name: string): bigint {
  const value = getField(scope, name);
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  throw new ValueTypeError('integer', value, name);
}

export function getBytes(scope: ValueMap, name: string): Uint8Array {
  return expectBytes(getField(scope, name), name);
}

export function getText(scope: ValueMap, name: string): string {
  return expectText(getField(scope, name), name);
}

export function getMap(scope: ValueMap, name: string): ValueMap {
  return expectMap(getField(scope, name), name);
}

export function getArray(scope: ValueMap, name: string): Value[] {
  return expectArray(getField(scope, name), name);
}
