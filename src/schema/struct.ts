import { DuplicateFieldError, InvalidSchemaError, SchemaOrderError } from '../errors';
import { consumesRemainder, exposedFields, unboundSequences } from './analysis';
import type { IntegerNode, LengthBinding, Node, SequenceNode, StructNode } from './types';

/**
 * Assemble an ordered, named collection of fields.
 *
 * This is the one-time wiring step of a layout: sibling names are checked
 * for uniqueness, remainder-consuming fields must come last, and every
 * Dynamic sequence is bound to an earlier integer sibling. The resulting
 * node is frozen.
 */
export function struct(name: string, children: readonly Node[]): StructNode {
  const declared = new Set<string>();
  const integers = new Map<string, IntegerNode>();
  const bindings = new Map<string, { lengthField: IntegerNode; sequences: SequenceNode[] }>();
  const namesFrom = (from: number) => children.slice(from).flatMap(c => exposedFields(c).map(([n]) => n));

  children.forEach((child, index) => {
    if (child.kind !== 'padding' && !child.name) {
      throw new InvalidSchemaError(`Field #${index} has no name`, name);
    }

    if (consumesRemainder(child) && index !== children.length - 1) {
      throw new SchemaOrderError(
        `Field '${child.name}' consumes the remaining bytes and must be the last field`,
        name,
      );
    }

    for (const seq of unboundSequences(child)) {
      if (seq.length.kind !== 'dynamic') continue;
      const { lengthField } = seq.length;
      const target = integers.get(lengthField);
      if (!target) {
        let reason = 'is not declared in this struct';
        if (declared.has(lengthField)) reason = 'must be an integer field of this struct';
        else if (namesFrom(index).includes(lengthField)) reason = 'must be declared before it';
        throw new SchemaOrderError(`Length field '${lengthField}' of '${seq.name}' ${reason}`, name);
      }
      const binding = bindings.get(lengthField) ?? { lengthField: target, sequences: [] };
      binding.sequences.push(seq);
      bindings.set(lengthField, binding);
    }

    for (const [exposed] of exposedFields(child)) {
      if (declared.has(exposed)) {
        throw new DuplicateFieldError(exposed, name);
      }
      declared.add(exposed);
    }
    if (child.kind === 'integer') {
      integers.set(child.name, child);
    }
  });

  const resolved: LengthBinding[] = Array.from(bindings.values(), b =>
    Object.freeze({ lengthField: b.lengthField, sequences: Object.freeze([...b.sequences]) }),
  );

  return Object.freeze({
    kind: 'struct',
    name,
    children: Object.freeze([...children]),
    bindings: Object.freeze(resolved),
  });
}

/** An unnamed root struct. */
export function layout(children: readonly Node[]): StructNode {
  return struct('', children);
}
