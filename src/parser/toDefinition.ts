import { InvalidSchemaError } from '../errors';
import type { BuildOptions } from '../schema/LayoutBuilder';
import { LayoutBuilder } from '../schema/LayoutBuilder';
import type { FieldDefinition, LengthDefinition } from '../schema/LayoutDefinition';
import type { StructNode } from '../schema/types';
import { parseLayoutModule } from './LayoutParser';
import type { LayoutDimension, LayoutField, LayoutModule, LayoutType } from './types';

/**
 * Convert every struct declaration of a layout module to a definition.
 * Struct references become `$ref` entries resolved against the same record.
 */
export function convertModuleToDefinitions(module: LayoutModule): Record<string, FieldDefinition> {
  const result: Record<string, FieldDefinition> = {};
  for (const decl of module.structs) {
    if (Object.prototype.hasOwnProperty.call(result, decl.name)) {
      throw new InvalidSchemaError(`Struct '${decl.name}' is declared twice (line ${decl.line})`);
    }
    result[decl.name] = {
      type: 'struct',
      name: decl.name,
      fields: decl.fields.map(f => convertField(f, decl.name)),
    };
  }
  return result;
}

/** Parse layout text and build every struct it declares. */
export function compileLayouts(text: string, options: BuildOptions = {}): Record<string, StructNode> {
  const nodes = LayoutBuilder.buildAll(convertModuleToDefinitions(parseLayoutModule(text)), options);
  const result: Record<string, StructNode> = {};
  for (const [name, node] of Object.entries(nodes)) {
    if (node.kind === 'struct') result[name] = node;
  }
  return result;
}

function convertLength(dimension: LayoutDimension): LengthDefinition {
  switch (dimension.kind) {
    case 'Fixed':
      return dimension.count;
    case 'Field':
      return { field: dimension.name };
    case 'Rest':
      return { rest: true };
  }
}

function convertField(field: LayoutField, path: string): FieldDefinition {
  switch (field.kind) {
    case 'Padding':
      return { type: 'padding', size: field.size };

    case 'Checksum':
      return {
        type: 'checksum',
        name: field.name,
        algorithm: field.algorithm,
        placement: field.placement,
        child: convertField(field.field, path),
      };

    case 'Field': {
      const { name, type, dimension, reversed } = field;
      const fieldPath = `${path}.${name}`;

      if (type.kind === 'Bytes') {
        if (!dimension) {
          throw new InvalidSchemaError(`${type.text ? 'string' : 'bytes'} field needs a dimension`, fieldPath);
        }
        return { type: 'bytes', name, length: convertLength(dimension), reverse: reversed, text: type.text };
      }

      if (!dimension) {
        if (reversed) {
          throw new InvalidSchemaError('Only sequences can be reversed', fieldPath);
        }
        return { ...convertType(type, fieldPath), name };
      }
      return {
        type: 'array',
        name,
        item: convertType(type, fieldPath),
        length: convertLength(dimension),
        reverse: reversed,
      };
    }
  }
}

type NamedDefinition = Exclude<FieldDefinition, { type: 'padding' }>;

function convertType(type: Exclude<LayoutType, { kind: 'Bytes' }>, path: string): NamedDefinition {
  switch (type.kind) {
    case 'Integer':
      return { type: type.signed ? 'int' : 'uint', width: type.width, byteOrder: type.byteOrder };
    case 'Float':
      return { type: 'float', width: type.width, byteOrder: type.byteOrder };
    case 'Struct':
      return { type: 'struct', fields: type.fields.map(f => convertField(f, path)) };
    case 'Reference':
      return { type: '$ref', ref: type.name };
  }
}
