import { z } from 'zod';
import { enumForSchema } from './enum.js';
import type { EnumDescriptor } from './enum.js';
import { jsonValueSchema } from './json-value.js';
import { buildNamingTables } from './naming.js';
import type { NamingTables } from './naming.js';

/** In-memory key of the flattened metadata envelope. */
export const ENVELOPE_KEY = 'meta';

/**
 * `record`: top-level business object (Meter, MarketLocation).
 * `component`: nested value type (Address, MeterRegister).
 * `envelope`: the shared metadata block flattened into its owner.
 */
export type TypeCategory = 'record' | 'component' | 'envelope';

/** How a field's value is carried on the wire. Derived once from its zod schema. */
export type FieldKind =
  | { readonly type: 'string' }
  | { readonly type: 'number' }
  | { readonly type: 'integer' }
  | { readonly type: 'boolean' }
  | { readonly type: 'datetime' }
  | { readonly type: 'json' }
  | { readonly type: 'enum'; readonly enumeration: EnumDescriptor }
  | { readonly type: 'object'; readonly target: TypeDescriptor }
  | { readonly type: 'list'; readonly item: FieldKind };

export interface FieldDescriptor {
  /** In-memory property name. */
  readonly key: string;
  readonly german: string;
  readonly english: string;
  readonly kind: FieldKind;
  readonly required: boolean;
}

export interface TypeDescriptor<T = unknown> {
  /** English type name, also the `_typ` value under the English convention. */
  readonly name: string;
  /** German type name, the `_typ` value under the German convention. */
  readonly germanName: string;
  readonly category: TypeCategory;
  /** Validates the in-memory shape. */
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Own fields in declaration order, envelope excluded. */
  readonly fields: readonly FieldDescriptor[];
  /** The flattened envelope type, when the type declares one. */
  readonly envelope: TypeDescriptor | undefined;
  readonly naming: NamingTables;
}

/** In-memory type described by a descriptor. */
export type RecordOf<D> = D extends TypeDescriptor<infer T> ? T : never;

type OwnKeys<S extends z.ZodRawShape> = Exclude<keyof S, typeof ENVELOPE_KEY>;

export interface TypeDefinition<S extends z.ZodRawShape> {
  readonly name: string;
  readonly germanName: string;
  readonly category: TypeCategory;
  readonly schema: z.ZodObject<S>;
  /** German wire name of every own field. */
  readonly german: { readonly [K in OwnKeys<S>]-?: string };
  /** English wire names that differ from the in-memory key. */
  readonly english?: { readonly [K in OwnKeys<S>]?: string };
}

const typesBySchema = new WeakMap<z.ZodTypeAny, TypeDescriptor>();
const typesByName = new Map<string, TypeDescriptor>();

function kindOf(schema: z.ZodTypeAny, location: string): FieldKind {
  if (schema === jsonValueSchema) return { type: 'json' };
  if (schema instanceof z.ZodString) return { type: 'string' };
  if (schema instanceof z.ZodNumber) return schema.isInt ? { type: 'integer' } : { type: 'number' };
  if (schema instanceof z.ZodBoolean) return { type: 'boolean' };
  if (schema instanceof z.ZodDate) return { type: 'datetime' };

  if (schema instanceof z.ZodEnum) {
    const enumeration = enumForSchema(schema);
    if (enumeration === undefined) {
      throw new Error(`${location}: enum schemas must come from defineEnum()`);
    }
    return { type: 'enum', enumeration };
  }

  if (schema instanceof z.ZodObject) {
    const target = typesBySchema.get(schema);
    if (target === undefined || target.category === 'envelope') {
      throw new Error(`${location}: nested objects must be types created with defineType()`);
    }
    return { type: 'object', target };
  }

  if (schema instanceof z.ZodArray) {
    const element: z.ZodTypeAny = schema.element;
    return { type: 'list', item: kindOf(element, `${location}[]`) };
  }

  throw new Error(`${location}: unsupported schema ${schema.constructor.name}`);
}

/**
 * Defines a record, component or envelope type.
 *
 * The zod object schema is the single source of truth for the in-memory
 * shape; `german` and `english` are the explicit naming tables. The
 * envelope member (`meta: metaSchema`) must be declared first.
 *
 * Throws on unsupported field schemas, missing German names and wire-name
 * collisions, so a broken catalog fails at import time.
 */
export function defineType<S extends z.ZodRawShape>(
  definition: TypeDefinition<S>,
): TypeDescriptor<z.infer<z.ZodObject<S>>> {
  const { name } = definition;
  if (typesByName.has(name)) {
    throw new Error(`Type ${name} is already defined`);
  }

  const shape: z.ZodRawShape = definition.schema.shape;
  const germanNames: Readonly<Record<string, string | undefined>> = definition.german;
  const englishNames: Readonly<Record<string, string | undefined>> = definition.english ?? {};

  const fields: FieldDescriptor[] = [];
  let envelope: TypeDescriptor | undefined;
  let position = 0;

  for (const [key, member] of Object.entries(shape)) {
    const location = `${name}.${key}`;

    if (key === ENVELOPE_KEY) {
      const target = member instanceof z.ZodObject ? typesBySchema.get(member) : undefined;
      if (target === undefined || target.category !== 'envelope') {
        throw new Error(`${location} must be the metadata envelope schema`);
      }
      if (position !== 0) {
        throw new Error(`${location} must be declared before all other fields`);
      }
      envelope = target;
    } else {
      const german = germanNames[key];
      if (german === undefined) {
        throw new Error(`${location} has no German wire name`);
      }
      const optional = member instanceof z.ZodOptional;
      const inner: z.ZodTypeAny = member instanceof z.ZodOptional ? member.unwrap() : member;
      fields.push(Object.freeze({
        key,
        german,
        english: englishNames[key] ?? key,
        kind: kindOf(inner, location),
        required: !optional,
      }));
    }

    position++;
  }

  const descriptor: TypeDescriptor<z.infer<z.ZodObject<S>>> = Object.freeze({
    name,
    germanName: definition.germanName,
    category: definition.category,
    schema: definition.schema,
    fields: Object.freeze(fields),
    envelope,
    naming: buildNamingTables(name, fields, envelope?.fields ?? []),
  });

  typesBySchema.set(definition.schema, descriptor);
  typesByName.set(name, descriptor);
  return descriptor;
}

/** Looks up a defined type by its English name. */
export function getType(name: string): TypeDescriptor | undefined {
  return typesByName.get(name);
}

/** All defined types, in definition order. */
export function listTypes(): TypeDescriptor[] {
  return [...typesByName.values()];
}

/** Human-readable name of a field kind, used in error messages. */
export function describeFieldKind(kind: FieldKind): string {
  switch (kind.type) {
    case 'enum':
      return `${kind.enumeration.name} token`;
    case 'object':
      return `${kind.target.name} object`;
    case 'list':
      return `list of ${describeFieldKind(kind.item)}`;
    case 'json':
      return 'JSON value';
    default:
      return kind.type;
  }
}
