import type { ChecksumAlgorithm } from '../checksum/algorithms';
import { DuplicateFieldError, SchemaOrderError } from '../errors';
import { consumesRemainder, exposedNames } from './analysis';
import { checkName, integer } from './numeric';
import type { ByteOrder, ChecksumNode, ChecksumPlacement, Node } from './types';

export interface ChecksumOptions {
  /** `'prefix'` (default) stores the code before the child's bytes. */
  placement?: ChecksumPlacement;
  byteOrder?: ByteOrder;
}

/**
 * Wrap `child` with an integrity code computed over its encoded bytes.
 * The code is exposed in the enclosing scope under `name`.
 */
export function checksum(
  name: string,
  algorithm: ChecksumAlgorithm,
  child: Node,
  options: ChecksumOptions = {},
): ChecksumNode {
  checkName(name, 'Checksum field');
  if (consumesRemainder(child)) {
    throw new SchemaOrderError('A checksum cannot wrap a field that consumes the remaining bytes', name);
  }
  if (exposedNames(child).includes(name)) {
    throw new DuplicateFieldError(name);
  }
  return Object.freeze({
    kind: 'checksum',
    name,
    child,
    algorithm,
    placement: options.placement ?? 'prefix',
    code: integer(name, { width: algorithm.width, byteOrder: options.byteOrder }),
  });
}
