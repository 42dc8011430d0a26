import type { FieldDescriptor } from './descriptor.js';

/** The two supported field-naming conventions. */
export const NAMING_CONVENTIONS = ['german', 'english'] as const;

/**
 * `german` is the domain-native BO4E convention (`zaehlernummer`),
 * `english` the ergonomic one (`meterNumber`).
 */
export type NamingConvention = (typeof NAMING_CONVENTIONS)[number];

/** A wire name resolved back to its field. */
export interface ResolvedField {
  readonly field: FieldDescriptor;
  /** True when the field belongs to the flattened metadata envelope. */
  readonly inEnvelope: boolean;
}

/**
 * Static name tables for one type.
 *
 * One encode table per convention (in-memory key → wire name) and one
 * combined decode table accepting wire names of either convention,
 * envelope attributes included. Built once when the type is defined and
 * only ever read afterwards; the maps are exposed as `ReadonlyMap`.
 */
export interface NamingTables {
  readonly encode: Readonly<Record<NamingConvention, ReadonlyMap<string, string>>>;
  readonly decode: ReadonlyMap<string, ResolvedField>;
}

/**
 * Builds the naming tables for a type.
 *
 * Throws when one wire name would resolve to two different fields, in
 * either convention, envelope attributes included.
 */
export function buildNamingTables(
  typeName: string,
  fields: readonly FieldDescriptor[],
  envelopeFields: readonly FieldDescriptor[],
): NamingTables {
  const german = new Map<string, string>();
  const english = new Map<string, string>();
  const decode = new Map<string, ResolvedField>();

  const claim = (name: string, resolved: ResolvedField): void => {
    const existing = decode.get(name);
    if (existing !== undefined && existing.field !== resolved.field) {
      throw new Error(
        `${typeName}: wire name "${name}" maps to both "${existing.field.key}" and "${resolved.field.key}"`,
      );
    }
    decode.set(name, resolved);
  };

  for (const field of envelopeFields) {
    const resolved: ResolvedField = { field, inEnvelope: true };
    claim(field.german, resolved);
    claim(field.english, resolved);
  }

  for (const field of fields) {
    const resolved: ResolvedField = { field, inEnvelope: false };
    german.set(field.key, field.german);
    english.set(field.key, field.english);
    claim(field.german, resolved);
    claim(field.english, resolved);
  }

  return Object.freeze({
    encode: Object.freeze({ german, english }),
    decode,
  });
}

/** Anything carrying naming tables, usually a `TypeDescriptor`. */
export interface Named {
  readonly naming: NamingTables;
}

/** Wire name to emit for an own field of a type, or `undefined` if the key is not a field. */
export function wireName(
  type: Named,
  key: string,
  convention: NamingConvention,
): string | undefined {
  return type.naming.encode[convention].get(key);
}

/**
 * Resolves a wire name found while decoding. Both conventions are tried;
 * `undefined` means the name is unknown and the caller ignores it.
 */
export function resolveWireName(type: Named, name: string): ResolvedField | undefined {
  return type.naming.decode.get(name);
}
