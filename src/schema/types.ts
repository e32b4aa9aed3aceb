import type { ChecksumAlgorithm } from '../checksum/algorithms';
import type { Value } from '../values';

export type ByteOrder = 'big' | 'little' | 'native';

export type IntegerWidth = 1 | 2 | 4 | 8;
export type FloatWidth = 4 | 8;

export interface IntegerNode {
  readonly kind: 'integer';
  readonly name: string;
  readonly signed: boolean;
  readonly width: IntegerWidth;
  readonly byteOrder: ByteOrder;
}

export interface FloatNode {
  readonly kind: 'float';
  readonly name: string;
  readonly width: FloatWidth;
  readonly byteOrder: ByteOrder;
}

export type NumericNode = IntegerNode | FloatNode;

/** Counts the elements (or bytes) of a sequence value on encode. */
export type CountFunction = (value: Value) => number;

export type LengthPolicy =
  | { readonly kind: 'static'; readonly count: number }
  | { readonly kind: 'dynamic'; readonly lengthField: string; readonly count?: CountFunction }
  | { readonly kind: 'consumer' };

export interface ArraySequence {
  readonly kind: 'array';
  /** Element layout. Its name is not used. */
  readonly element: Node;
  readonly reverse: boolean;
}

export interface BytesSequence {
  readonly kind: 'bytes';
  readonly reverse: boolean;
  /** Values are UTF-8 strings instead of raw bytes. */
  readonly text: boolean;
}

export interface SequenceNode {
  readonly kind: 'sequence';
  readonly name: string;
  readonly sequence: ArraySequence | BytesSequence;
  readonly length: LengthPolicy;
}

/** A sibling integer field supplying the count of one or more Dynamic sequences. */
export interface LengthBinding {
  readonly lengthField: IntegerNode;
  readonly sequences: readonly SequenceNode[];
}

export interface StructNode {
  readonly kind: 'struct';
  readonly name: string;
  readonly children: readonly Node[];
  /** Resolved once, when the struct is assembled. */
  readonly bindings: readonly LengthBinding[];
}

export type ChecksumPlacement = 'prefix' | 'suffix';

export interface ChecksumNode {
  readonly kind: 'checksum';
  /** Name under which the stored code appears in the value scope. */
  readonly name: string;
  readonly child: Node;
  readonly algorithm: ChecksumAlgorithm;
  readonly placement: ChecksumPlacement;
  /** Unsigned integer field of the algorithm's width holding the code. */
  readonly code: IntegerNode;
}

export interface PaddingNode {
  readonly kind: 'padding';
  readonly name: string;
  readonly bytes: Uint8Array;
}

export type Node =
  | IntegerNode
  | FloatNode
  | SequenceNode
  | StructNode
  | ChecksumNode
  | PaddingNode;

export type NodeKind = Node['kind'];

/** Sentinel element count meaning "everything left in the buffer". */
export const CONSUME_ALL = -1;
