import { InvalidSchemaError } from '../errors';
import { LayoutCodec } from '../schema/LayoutCodec';
import type { StructNode } from '../schema/types';
import type { ValueMap } from '../values';

export interface MessageDefinition<T> {
  /** Wire identifier carried in the frame header. */
  id: number;
  name: string;
  layout: StructNode;
  /** Adapter from a decoded value tree to the domain object. */
  fromValue(value: ValueMap): T;
  /** Adapter from the domain object to a value tree. */
  toValue(message: T): ValueMap;
}

export interface MessageType<T> extends Readonly<MessageDefinition<T>> {
  readonly codec: LayoutCodec;
}

/** Bind an id and a layout to a domain type. */
export function defineMessage<T>(definition: MessageDefinition<T>): MessageType<T> {
  const { id, name, layout, fromValue, toValue } = definition;
  if (!Number.isInteger(id) || id < 0) {
    throw new InvalidSchemaError(`Message id must be a non-negative integer, got ${id}`, name);
  }
  return Object.freeze({ id, name, layout, fromValue, toValue, codec: new LayoutCodec(layout) });
}
