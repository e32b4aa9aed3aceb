import type { ChecksumAlgorithm } from '../checksum/algorithms';
import { defaultAlgorithms } from '../checksum/algorithms';
import { InvalidSchemaError, UnknownVariantError } from '../errors';
import { checksum } from './checksum';
import type { FieldDefinition, LengthDefinition } from './LayoutDefinition';
import { parseFieldDefinition } from './LayoutDefinition';
import { float, integer } from './numeric';
import { padding } from './padding';
import type { LengthSpec } from './sequence';
import { array, bytes, consumer, dynamic, fixed } from './sequence';
import { struct } from './struct';
import type { Node } from './types';

export interface BuildOptions {
  /** Checksum algorithms addressable by name. Defaults to {@link defaultAlgorithms}. */
  algorithms?: Readonly<Record<string, ChecksumAlgorithm>>;
}

/** Element nodes of arrays are unnamed in definitions. */
const ELEMENT_NAME = 'item';

function toLengthSpec(length: LengthDefinition): LengthSpec {
  if (typeof length === 'number') return fixed(length);
  if ('fixed' in length) return fixed(length.fixed);
  if ('field' in length) return dynamic(length.field);
  return consumer();
}

/**
 * Builds layout nodes from JSON-serializable definitions.
 */
export class LayoutBuilder {
  /** Build a node from a definition that contains no `$ref`. */
  static build(definition: FieldDefinition, options: BuildOptions = {}): Node {
    return LayoutBuilder.buildAll({ '': definition }, options)[''];
  }

  /**
   * Build every definition of a registry. `$ref` nodes resolve against the
   * registry by key and take the referring field's name.
   */
  static buildAll(definitions: Record<string, FieldDefinition>, options: BuildOptions = {}): Record<string, Node> {
    const algorithms = options.algorithms ?? defaultAlgorithms;
    const resolving: string[] = [];

    function buildNode(def: FieldDefinition, fallbackName: string): Node {
      const name = def.type === 'padding' ? '' : def.name ?? fallbackName;
      switch (def.type) {
        case 'int':
        case 'uint':
          return integer(name, { signed: def.type === 'int', width: def.width, byteOrder: def.byteOrder });
        case 'float':
          return float(name, { width: def.width, byteOrder: def.byteOrder });
        case 'bytes':
          return bytes(name, toLengthSpec(def.length), { reverse: def.reverse, text: def.text });
        case 'array':
          return array(name, buildNode(def.item, ELEMENT_NAME), toLengthSpec(def.length), { reverse: def.reverse });
        case 'struct':
          return struct(name, def.fields.map(f => buildNode(f, '')));
        case 'checksum': {
          const algorithm = Object.prototype.hasOwnProperty.call(algorithms, def.algorithm)
            ? algorithms[def.algorithm]
            : undefined;
          if (!algorithm) throw new UnknownVariantError('checksum algorithm', def.algorithm);
          return checksum(name, algorithm, buildNode(def.child, ''), {
            placement: def.placement,
            byteOrder: def.byteOrder,
          });
        }
        case 'padding':
          return padding(def.fill ?? def.size ?? 0);
        case '$ref':
          return resolve(def.ref, name);
      }
    }

    function resolve(ref: string, name: string): Node {
      if (!Object.prototype.hasOwnProperty.call(definitions, ref)) {
        throw new UnknownVariantError('layout reference', ref);
      }
      if (resolving.includes(ref)) {
        throw new InvalidSchemaError(`Layout reference cycle: ${[...resolving, ref].join(' -> ')}`);
      }
      resolving.push(ref);
      try {
        const target = definitions[ref];
        return buildNode(target.type === 'padding' ? target : { ...target, name }, name);
      } finally {
        resolving.pop();
      }
    }

    const nodes: Record<string, Node> = {};
    for (const [key, definition] of Object.entries(definitions)) {
      nodes[key] = key ? resolve(key, definition.type === 'padding' ? '' : definition.name ?? key) : buildNode(definition, '');
    }
    return nodes;
  }

  /** Parse a JSON string into a definition and build the node. */
  static fromJSON(json: string, options: BuildOptions = {}): Node {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (err) {
      throw new InvalidSchemaError(`Invalid layout JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return LayoutBuilder.build(parseFieldDefinition(raw), options);
  }
}
