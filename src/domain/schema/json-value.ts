import { z } from 'zod';

/** Any value JSON can carry. Used for free-form additional attribute values. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Checks that `value` is a JSON value with finite numbers and plain
 * objects only. Walks the value with an explicit stack, so nesting depth
 * is bounded by memory; a cycle fails the check.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  const ancestors = new Set<object>();
  const pending: { node: unknown; leave: boolean }[] = [{ node: value, leave: false }];

  for (let frame = pending.pop(); frame !== undefined; frame = pending.pop()) {
    const { node, leave } = frame;
    if (node === null || typeof node === 'string' || typeof node === 'boolean') continue;
    if (typeof node === 'number') {
      if (!Number.isFinite(node)) return false;
      continue;
    }
    if (typeof node !== 'object') return false;

    if (leave) {
      ancestors.delete(node);
      continue;
    }
    if (ancestors.has(node)) return false;

    let children: unknown[];
    if (Array.isArray(node)) {
      children = node;
    } else if (isPlainObject(node)) {
      children = Object.values(node);
    } else {
      return false;
    }

    ancestors.add(node);
    pending.push({ node, leave: true });
    for (const child of children) pending.push({ node: child, leave: false });
  }
  return true;
}

/** Schema for {@link JsonValue}, backed by {@link isJsonValue}. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.custom<JsonValue>(isJsonValue, {
  message: 'Expected a JSON value with finite numbers',
});

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/** Plain JSON object check (not null, not an array). */
export function isJsonObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Short name of a JSON node kind, used in error messages. */
export function describeJsonKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  return typeof value;
}
