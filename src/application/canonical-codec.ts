import type { Logger } from 'pino';
import type { TypeDescriptor } from '../domain/schema/descriptor.js';
import { EncodeError, JsonSyntaxError, decodeFail } from './errors.js';
import type { DecodeResult } from './errors.js';
import { resolveSerializeConfig } from './serialize-config.js';
import type { SerializeOptions } from './serialize-config.js';
import { logDecodeFailure, materialize } from './tree-decoder.js';
import { writeObject } from './wire-encoder.js';

/**
 * UTF-8 decoder shared by both decode paths. A leading byte order mark is
 * kept in the text, so it surfaces as a syntax error.
 */
export const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** A UTF-16 surrogate without its partner. */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Serializes a record to JSON text.
 *
 * Output is deterministic: envelope attributes first, then fields in
 * declaration order, absent fields omitted, datetimes as ISO-8601 UTC,
 * enums as their wire token. Throws {@link EncodeError} when the record
 * does not satisfy its type's schema.
 */
export function encodeToString<T>(
  type: TypeDescriptor<T>,
  record: T,
  options?: SerializeOptions,
): string {
  const config = resolveSerializeConfig(options);

  const parsed = type.schema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EncodeError(type.name, issue?.path ?? [], issue?.message ?? 'invalid record');
  }

  const tree = writeObject(type.name, type, parsed.data, config.convention, []);
  return JSON.stringify(tree, null, config.pretty ? 2 : undefined);
}

/** Serializes a record to UTF-8 JSON bytes. */
export function encode<T>(
  type: TypeDescriptor<T>,
  record: T,
  options?: SerializeOptions,
): Uint8Array {
  return Buffer.from(encodeToString(type, record, options), 'utf8');
}

/**
 * Decodes JSON in either naming convention.
 *
 * Never throws for bad input: malformed JSON, a shape mismatch or an
 * unknown enum token come back as `{ ok: false, error }`.
 */
export function decode<T>(
  type: TypeDescriptor<T>,
  input: Uint8Array | string,
  log?: Logger,
): DecodeResult<T> {
  const result = parseText(input);
  const decoded = result.ok ? materialize(type, result.value, log) : decodeFail<T>(result.error);
  if (!decoded.ok) logDecodeFailure(log, type, decoded.error);
  return decoded;
}

function parseText(input: Uint8Array | string): DecodeResult<unknown> {
  let text: string;
  if (typeof input === 'string') {
    // Same text the in-place decoder sees after UTF-8 encoding.
    text = input.replace(LONE_SURROGATE, '\uFFFD');
  } else {
    try {
      text = utf8Decoder.decode(input);
    } catch (err: unknown) {
      if (err instanceof TypeError) {
        return decodeFail(new JsonSyntaxError('Input is not valid UTF-8'));
      }
      throw err;
    }
  }

  try {
    const tree: unknown = JSON.parse(text);
    return { ok: true, value: tree };
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      return decodeFail(new JsonSyntaxError(err.message));
    }
    throw err;
  }
}

/** German-convention JSON text, the BO4E default. */
export function toJsonGerman<T>(type: TypeDescriptor<T>, record: T, pretty = false): string {
  return encodeToString(type, record, { convention: 'german', pretty });
}

/** English-convention JSON text. */
export function toJsonEnglish<T>(type: TypeDescriptor<T>, record: T, pretty = false): string {
  return encodeToString(type, record, { convention: 'english', pretty });
}

/** Decodes JSON text of either convention. Same as {@link decode}. */
export function fromJson<T>(type: TypeDescriptor<T>, text: string, log?: Logger): DecodeResult<T> {
  return decode(type, text, log);
}
