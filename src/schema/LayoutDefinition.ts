import { InvalidSchemaError } from '../errors';
import type { ByteOrder, ChecksumPlacement, FloatWidth, IntegerWidth } from './types';

/**
 * How a sequence definition gets its length: a bare number is static,
 * `{ field }` names a sibling length field, `{ rest: true }` consumes the remainder.
 */
export type LengthDefinition = number | { fixed: number } | { field: string } | { rest: true };

/**
 * JSON-serializable definition of any layout node.
 * `name` is required wherever the node is a struct member.
 */
export type FieldDefinition =
  | { type: 'int' | 'uint'; name?: string; width: IntegerWidth; byteOrder?: ByteOrder }
  | { type: 'float'; name?: string; width: FloatWidth; byteOrder?: ByteOrder }
  | { type: 'bytes'; name?: string; length: LengthDefinition; reverse?: boolean; text?: boolean }
  | { type: 'array'; name?: string; item: FieldDefinition; length: LengthDefinition; reverse?: boolean }
  | { type: 'struct'; name?: string; fields: FieldDefinition[] }
  | {
      type: 'checksum';
      name: string;
      algorithm: string;
      child: FieldDefinition;
      placement?: ChecksumPlacement;
      byteOrder?: ByteOrder;
    }
  | { type: 'padding'; size?: number; fill?: number[] }
  | { type: '$ref'; name?: string; ref: string };

// ---------------------------------------------------------------------------
// Validation of untyped input (parsed JSON)
// ---------------------------------------------------------------------------

type RawObject = { [key: string]: unknown };

function isObject(raw: unknown): raw is RawObject {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function fail(message: string, path: string): never {
  throw new InvalidSchemaError(message, path || undefined);
}

function optionalString(raw: RawObject, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') fail(`'${key}' must be a string`, path);
  return value;
}

function requiredString(raw: RawObject, key: string, path: string): string {
  const value = optionalString(raw, key, path);
  if (value === undefined) fail(`'${key}' is required`, path);
  return value;
}

function optionalBoolean(raw: RawObject, key: string, path: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') fail(`'${key}' must be a boolean`, path);
  return value;
}

function optionalByteOrder(raw: RawObject, path: string): ByteOrder | undefined {
  const value = raw.byteOrder;
  if (value === undefined) return undefined;
  if (value === 'big' || value === 'little' || value === 'native') return value;
  return fail(`Unknown byte order ${JSON.stringify(value)}`, path);
}

function integerWidth(raw: RawObject, path: string): IntegerWidth {
  const { width } = raw;
  if (width === 1 || width === 2 || width === 4 || width === 8) return width;
  return fail(`Integer width must be 1, 2, 4 or 8, got ${JSON.stringify(width)}`, path);
}

function floatWidth(raw: RawObject, path: string): FloatWidth {
  const { width } = raw;
  if (width === 4 || width === 8) return width;
  return fail(`Float width must be 4 or 8, got ${JSON.stringify(width)}`, path);
}

function placementOf(raw: unknown, path: string): ChecksumPlacement | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'prefix' || raw === 'suffix') return raw;
  return fail(`Unknown checksum placement ${JSON.stringify(raw)}`, path);
}

function paddingSize(raw: unknown, path: string): number | undefined {
  if (raw === undefined || typeof raw === 'number') return raw;
  return fail("'size' must be a number", path);
}

function paddingFill(raw: unknown, path: string): number[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) fail("'fill' must be an array of byte values", path);
  return raw.map(b => (typeof b === 'number' ? b : fail("'fill' must be an array of byte values", path)));
}

function lengthDefinition(raw: unknown, path: string): LengthDefinition {
  if (typeof raw === 'number') return raw;
  if (isObject(raw)) {
    const { fixed, field, rest } = raw;
    if (typeof fixed === 'number') return { fixed };
    if (typeof field === 'string') return { field };
    if (rest === true) return { rest: true };
  }
  return fail(`Invalid length ${JSON.stringify(raw)}`, path);
}

/** Check that parsed JSON has the shape of a {@link FieldDefinition}. */
export function parseFieldDefinition(raw: unknown, path = ''): FieldDefinition {
  if (!isObject(raw)) fail('Field definition must be an object', path);
  const name = optionalString(raw, 'name', path);
  const here = name ? (path ? `${path}.${name}` : name) : path;

  const { type } = raw;
  switch (type) {
    case 'int':
    case 'uint':
      return { type: type === 'int' ? 'int' : 'uint', name, width: integerWidth(raw, here), byteOrder: optionalByteOrder(raw, here) };
    case 'float':
      return { type: 'float', name, width: floatWidth(raw, here), byteOrder: optionalByteOrder(raw, here) };
    case 'bytes':
      return {
        type: 'bytes',
        name,
        length: lengthDefinition(raw.length, here),
        reverse: optionalBoolean(raw, 'reverse', here),
        text: optionalBoolean(raw, 'text', here),
      };
    case 'array':
      return {
        type: 'array',
        name,
        item: parseFieldDefinition(raw.item, `${here}[]`),
        length: lengthDefinition(raw.length, here),
        reverse: optionalBoolean(raw, 'reverse', here),
      };
    case 'struct': {
      const { fields } = raw;
      if (!Array.isArray(fields)) fail("'fields' must be an array", here);
      return { type: 'struct', name, fields: fields.map(f => parseFieldDefinition(f, here)) };
    }
    case 'checksum':
      return {
        type: 'checksum',
        name: requiredString(raw, 'name', path),
        algorithm: requiredString(raw, 'algorithm', here),
        child: parseFieldDefinition(raw.child, here),
        placement: placementOf(raw.placement, here),
        byteOrder: optionalByteOrder(raw, here),
      };
    case 'padding':
      return { type: 'padding', size: paddingSize(raw.size, path), fill: paddingFill(raw.fill, path) };
    case '$ref':
      return { type: '$ref', name, ref: requiredString(raw, 'ref', here) };
    default:
      return fail(`Unknown field type ${JSON.stringify(type)}`, here);
  }
}
