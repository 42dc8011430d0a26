import { listTypes } from '../domain/schema/descriptor.js';
import type { FieldDescriptor, FieldKind, TypeDescriptor } from '../domain/schema/descriptor.js';
import { wireName } from '../domain/schema/naming.js';
import type { NamingConvention } from '../domain/schema/naming.js';
import type { JsonObject } from './wire-encoder.js';

export const JSON_SCHEMA_DIALECT = 'https://json-schema.org/draft/2020-12/schema';

/** Type name as it appears under `convention`. */
function typeTitle(type: TypeDescriptor, convention: NamingConvention): string {
  return convention === 'german' ? type.germanName : type.name;
}

class SchemaWriter {
  readonly defs = new Map<string, JsonObject>();

  constructor(private readonly convention: NamingConvention) {}

  /** Object schema of a type: envelope attributes then own fields. */
  objectSchema(type: TypeDescriptor): JsonObject {
    const properties: JsonObject = {};
    const required: string[] = [];

    const add = (owner: TypeDescriptor, field: FieldDescriptor): void => {
      const name = wireName(owner, field.key, this.convention) ?? field.key;
      properties[name] = this.fieldSchema(field.kind);
      if (field.required) required.push(name);
    };
    const { envelope } = type;
    if (envelope !== undefined) {
      for (const field of envelope.fields) add(envelope, field);
    }
    for (const field of type.fields) add(type, field);

    const schema: JsonObject = {
      type: 'object',
      title: typeTitle(type, this.convention),
      properties,
      additionalProperties: true,
    };
    if (required.length > 0) schema['required'] = required;
    return schema;
  }

  /** Adds `type` to `$defs` (once) and returns its name there. */
  define(type: TypeDescriptor): string {
    const name = typeTitle(type, this.convention);
    if (!this.defs.has(name)) {
      // Reserve the slot first so self-references terminate.
      this.defs.set(name, {});
      this.defs.set(name, this.objectSchema(type));
    }
    return name;
  }

  private fieldSchema(kind: FieldKind): JsonObject {
    switch (kind.type) {
      case 'string':
      case 'number':
      case 'integer':
      case 'boolean':
        return { type: kind.type };
      case 'datetime':
        return { type: 'string', format: 'date-time' };
      case 'json':
        return {};
      case 'enum':
        return {
          type: 'string',
          title: this.convention === 'german' ? kind.enumeration.germanName : kind.enumeration.name,
          enum: [...kind.enumeration.tokens],
        };
      case 'object':
        return { $ref: `#/$defs/${this.define(kind.target)}` };
      case 'list':
        return { type: 'array', items: this.fieldSchema(kind.item) };
    }
  }

  definitions(): JsonObject {
    return Object.fromEntries(this.defs);
  }
}

/**
 * JSON Schema of one type's wire form under `convention`.
 *
 * Properties are keyed by wire names, envelope attributes included; nested
 * types are referenced through `$defs`. Unknown properties are allowed,
 * matching the decoder, which ignores them.
 */
export function describeType(type: TypeDescriptor, convention: NamingConvention = 'german'): JsonObject {
  const writer = new SchemaWriter(convention);
  const schema: JsonObject = { $schema: JSON_SCHEMA_DIALECT, ...writer.objectSchema(type) };
  if (writer.defs.size > 0) schema['$defs'] = writer.definitions();
  return schema;
}

/** JSON Schema with a `$defs` entry for every defined record and component. */
export function describeCatalog(convention: NamingConvention = 'german'): JsonObject {
  const writer = new SchemaWriter(convention);
  for (const type of listTypes()) {
    if (type.category !== 'envelope') writer.define(type);
  }
  return { $schema: JSON_SCHEMA_DIALECT, $defs: writer.definitions() };
}
