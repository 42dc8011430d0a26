import { ENVELOPE_KEY, describeFieldKind } from '../domain/schema/descriptor.js';
import type { FieldKind, TypeDescriptor } from '../domain/schema/descriptor.js';
import { describeJsonKind, isJsonObject, isJsonValue } from '../domain/schema/json-value.js';
import type { JsonValue } from '../domain/schema/json-value.js';
import { wireName } from '../domain/schema/naming.js';
import type { NamingConvention } from '../domain/schema/naming.js';
import { EncodeError } from './errors.js';
import type { FieldPath } from './errors.js';

export type JsonObject = { [key: string]: JsonValue };

/**
 * Writes an in-memory value of `type` as a JSON object tree.
 *
 * Envelope attributes come first, then own fields in declaration order.
 * Absent (`undefined`) fields are skipped rather than written as `null`.
 * The value is expected to have passed the type's schema already.
 */
export function writeObject(
  rootName: string,
  type: TypeDescriptor,
  value: unknown,
  convention: NamingConvention,
  path: FieldPath,
): JsonObject {
  if (!isJsonObject(value)) {
    throw new EncodeError(rootName, path, `expected ${type.name} object, found ${describeJsonKind(value)}`);
  }

  const out: JsonObject = {};
  if (type.envelope !== undefined) {
    writeFields(rootName, type.envelope, value[ENVELOPE_KEY] ?? {}, convention, [...path, ENVELOPE_KEY], out);
  }
  writeFields(rootName, type, value, convention, path, out);
  return out;
}

/** Writes the own fields of `type` found on `source` into `out`. */
export function writeFields(
  rootName: string,
  type: TypeDescriptor,
  source: unknown,
  convention: NamingConvention,
  path: FieldPath,
  out: JsonObject,
): void {
  if (!isJsonObject(source)) {
    throw new EncodeError(rootName, path, `expected ${type.name} object, found ${describeJsonKind(source)}`);
  }

  for (const field of type.fields) {
    const value = source[field.key];
    if (value === undefined) continue;
    const fieldPath = [...path, field.key];
    const name = wireName(type, field.key, convention);
    if (name === undefined) {
      throw new EncodeError(rootName, fieldPath, `${type.name} has no ${convention} wire name for ${field.key}`);
    }
    out[name] = writeValue(rootName, field.kind, value, convention, fieldPath);
  }
}

function writeValue(
  rootName: string,
  kind: FieldKind,
  value: unknown,
  convention: NamingConvention,
  path: FieldPath,
): JsonValue {
  switch (kind.type) {
    case 'string':
      if (typeof value === 'string') return value;
      break;
    case 'number':
    case 'integer':
      if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
          throw new EncodeError(rootName, path, `non-finite number ${value} has no JSON representation`);
        }
        return value;
      }
      break;
    case 'boolean':
      if (typeof value === 'boolean') return value;
      break;
    case 'datetime':
      if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
      break;
    case 'enum':
      if (typeof value === 'string' && kind.enumeration.byToken.has(value)) return value;
      break;
    case 'json':
      if (isJsonValue(value)) return value;
      break;
    case 'object':
      return writeObject(rootName, kind.target, value, convention, path);
    case 'list':
      if (Array.isArray(value)) {
        return value.map((item: unknown, index) =>
          writeValue(rootName, kind.item, item, convention, [...path, index]),
        );
      }
      break;
  }

  throw new EncodeError(
    rootName,
    path,
    `expected ${describeFieldKind(kind)}, found ${describeJsonKind(value)}`,
  );
}
