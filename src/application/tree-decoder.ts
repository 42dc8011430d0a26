import type { Logger } from 'pino';
import { z } from 'zod';
import { ENVELOPE_KEY, describeFieldKind } from '../domain/schema/descriptor.js';
import type { FieldDescriptor, FieldKind, TypeDescriptor } from '../domain/schema/descriptor.js';
import { resolveEnumToken } from '../domain/schema/enum.js';
import { describeJsonKind, isJsonObject } from '../domain/schema/json-value.js';
import { resolveWireName } from '../domain/schema/naming.js';
import {
  ShapeMismatchError,
  UnknownEnumTokenError,
  decodeFail,
  decodeOk,
  formatPath,
} from './errors.js';
import type { DecodeError, DecodeResult, FieldPath } from './errors.js';

const datetimeSchema = z.string().datetime({ offset: true });

interface DecodeContext {
  readonly root: TypeDescriptor;
  readonly log: Logger | undefined;
}

/**
 * Turns a parsed JSON tree into a validated in-memory record.
 *
 * Shared by the canonical and the in-place decoder, so both agree on
 * everything that happens after parsing:
 *
 * - wire names are resolved against both conventions; unknown names are
 *   skipped;
 * - JSON `null` means absent, except for free-form JSON values, which are
 *   kept verbatim;
 * - when several wire names resolve to the same field, the one appearing
 *   last in the object wins;
 * - envelope attributes are gathered into `meta` (`{}` when none appear);
 * - enum tokens and datetimes are converted, then the type's schema
 *   validates the result.
 */
export function materialize<T>(
  type: TypeDescriptor<T>,
  tree: unknown,
  log?: Logger,
): DecodeResult<T> {
  const context: DecodeContext = { root: type, log };

  let normalized: { [key: string]: unknown };
  try {
    normalized = readObject(context, type, tree, []);
  } catch (err: unknown) {
    if (err instanceof ShapeMismatchError || err instanceof UnknownEnumTokenError) {
      return decodeFail(err);
    }
    throw err;
  }

  const parsed = type.schema.safeParse(normalized);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue === undefined) {
      return decodeFail(new ShapeMismatchError(type.name, [], 'valid record', 'invalid value'));
    }
    return decodeFail(
      issue.code === 'invalid_type'
        ? new ShapeMismatchError(type.name, issue.path, issue.expected, issue.received)
        : new ShapeMismatchError(type.name, issue.path, 'valid value', issue.message),
    );
  }
  return decodeOk(parsed.data);
}

/** Logs a failed decode at debug level. */
export function logDecodeFailure(log: Logger | undefined, type: TypeDescriptor, error: DecodeError): void {
  log?.debug(
    {
      type: type.name,
      kind: error.kind,
      path: 'path' in error ? formatPath(error.path) : undefined,
    },
    'Decode failed',
  );
}

function readObject(
  context: DecodeContext,
  type: TypeDescriptor,
  node: unknown,
  path: FieldPath,
): { [key: string]: unknown } {
  if (!isJsonObject(node)) {
    throw new ShapeMismatchError(context.root.name, path, `${type.name} object`, describeJsonKind(node));
  }

  const own: { [key: string]: unknown } = {};
  const meta: { [key: string]: unknown } = {};

  for (const [name, raw] of Object.entries(node)) {
    const resolved = resolveWireName(type, name);
    if (resolved === undefined) {
      context.log?.trace({ type: type.name, field: name }, 'Ignoring unknown field');
      continue;
    }

    const { field, inEnvelope } = resolved;
    const target = inEnvelope ? meta : own;
    if (raw === null && field.kind.type !== 'json') {
      delete target[field.key];
      continue;
    }

    const fieldPath = inEnvelope ? [...path, ENVELOPE_KEY, field.key] : [...path, field.key];
    target[field.key] = readValue(context, field, field.kind, raw, fieldPath);
  }

  for (const field of type.fields) {
    if (field.required && own[field.key] === undefined) {
      throw new ShapeMismatchError(
        context.root.name,
        [...path, field.key],
        describeFieldKind(field.kind),
        'nothing',
      );
    }
  }

  if (type.envelope !== undefined) {
    own[ENVELOPE_KEY] = meta;
  }
  return own;
}

function readValue(
  context: DecodeContext,
  field: FieldDescriptor,
  kind: FieldKind,
  raw: unknown,
  path: FieldPath,
): unknown {
  switch (kind.type) {
    case 'string':
      if (typeof raw === 'string') return raw;
      break;
    case 'number':
      if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
      break;
    case 'integer':
      if (Number.isInteger(raw)) return raw;
      break;
    case 'boolean':
      if (typeof raw === 'boolean') return raw;
      break;
    case 'datetime':
      if (typeof raw === 'string' && datetimeSchema.safeParse(raw).success) {
        const date = new Date(raw);
        if (!Number.isNaN(date.getTime())) return date;
      }
      break;
    case 'enum':
      if (typeof raw === 'string') {
        const token = resolveEnumToken(kind.enumeration, raw);
        if (token === undefined) {
          throw new UnknownEnumTokenError(raw, kind.enumeration.name, field.key, path);
        }
        return token;
      }
      break;
    case 'json':
      return raw;
    case 'object':
      return readObject(context, kind.target, raw, path);
    case 'list':
      if (Array.isArray(raw)) {
        return raw.map((item: unknown, index) => readValue(context, field, kind.item, item, [...path, index]));
      }
      break;
  }

  throw new ShapeMismatchError(
    context.root.name,
    path,
    describeFieldKind(kind),
    describeFound(raw),
  );
}

function describeFound(raw: unknown): string {
  if (typeof raw === 'number' && !Number.isFinite(raw)) return 'out-of-range number';
  if (typeof raw === 'string') return `string "${raw}"`;
  return describeJsonKind(raw);
}
