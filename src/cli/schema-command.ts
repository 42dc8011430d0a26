import '../domain/catalog/index.js';
import { getType, listTypes } from '../domain/schema/descriptor.js';
import type { NamingConvention } from '../domain/schema/naming.js';
import { describeCatalog, describeType } from '../application/schema-dump.js';
import type { JsonObject } from '../application/wire-encoder.js';

export interface SchemaCommandOptions {
  convention: NamingConvention;
  /** English or German type name; the whole catalog when omitted. */
  typeName?: string | undefined;
  pretty: boolean;
}

export type SchemaCommandResult =
  | { ok: true; output: string }
  | { ok: false; message: string };

/** Renders the requested JSON Schema as text. */
export function runSchemaCommand(options: SchemaCommandOptions): SchemaCommandResult {
  const { convention, typeName, pretty } = options;

  let schema: JsonObject;
  if (typeName === undefined) {
    schema = describeCatalog(convention);
  } else {
    const type = getType(typeName) ?? listTypes().find((candidate) => candidate.germanName === typeName);
    if (type === undefined || type.category === 'envelope') {
      const known = listTypes()
        .filter((candidate) => candidate.category !== 'envelope')
        .map((candidate) => candidate.name)
        .join(', ');
      return { ok: false, message: `Unknown type "${typeName}". Known types: ${known}` };
    }
    schema = describeType(type, convention);
  }

  return { ok: true, output: JSON.stringify(schema, null, pretty ? 2 : undefined) };
}
