import type { Node, SequenceNode } from './types';

/**
 * Names a node contributes to its enclosing scope, paired with the node
 * that owns each name. A checksum contributes its code plus whatever its
 * child contributes; padding contributes nothing.
 */
export function exposedFields(node: Node): Array<[string, Node]> {
  switch (node.kind) {
    case 'integer':
    case 'float':
    case 'sequence':
    case 'struct':
      return [[node.name, node]];
    case 'checksum':
      return [[node.name, node], ...exposedFields(node.child)];
    case 'padding':
      return [];
  }
}

export function exposedNames(node: Node): string[] {
  return exposedFields(node).map(([name]) => name);
}

/** True when decoding the node reads until the end of the buffer. */
export function consumesRemainder(node: Node): boolean {
  switch (node.kind) {
    case 'sequence':
      return node.length.kind === 'consumer';
    case 'struct':
      return node.children.length > 0 && consumesRemainder(node.children[node.children.length - 1]);
    case 'checksum':
      return consumesRemainder(node.child);
    case 'integer':
    case 'float':
    case 'padding':
      return false;
  }
}

/**
 * Dynamic sequences that must be bound to a sibling length field by the
 * enclosing struct. Structs bind their own children, so they report none.
 */
export function unboundSequences(node: Node): SequenceNode[] {
  switch (node.kind) {
    case 'sequence':
      return node.length.kind === 'dynamic' ? [node] : [];
    case 'checksum':
      return unboundSequences(node.child);
    case 'integer':
    case 'float':
    case 'struct':
    case 'padding':
      return [];
  }
}

/** Smallest number of bytes the node can encode to. */
export function minimumSize(node: Node): number {
  switch (node.kind) {
    case 'integer':
    case 'float':
      return node.width;
    case 'padding':
      return node.bytes.length;
    case 'sequence': {
      if (node.length.kind !== 'static') return 0;
      const { sequence } = node;
      const unit = sequence.kind === 'bytes' ? 1 : minimumSize(sequence.element);
      return node.length.count * unit;
    }
    case 'struct':
      return node.children.reduce((sum, child) => sum + minimumSize(child), 0);
    case 'checksum':
      return node.algorithm.width + minimumSize(node.child);
  }
}
