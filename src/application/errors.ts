/**
 * Error types raised by the codec.
 *
 * Every error carries a string `kind` so callers can switch on it without
 * `instanceof` chains. Decoders never throw these for bad input; they
 * return them inside a {@link DecodeResult}.
 */

/** Location of a value inside a record: property keys and list indexes. */
export type FieldPath = readonly (string | number)[];

/** Renders a path as `registers[0].unit`; the empty path is `<root>`. */
export function formatPath(path: FieldPath): string {
  if (path.length === 0) return '<root>';
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out === '' ? segment : `.${segment}`;
    }
  }
  return out;
}

export class Bo4eError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Bo4eError';
    Object.setPrototypeOf(this, Bo4eError.prototype);
  }
}

/** Input bytes are not well-formed JSON. `offset` is the byte position, when known. */
export class JsonSyntaxError extends Bo4eError {
  readonly kind = 'syntax' as const;

  constructor(message: string, public readonly offset?: number | undefined) {
    super(offset === undefined ? message : `${message} at byte ${offset}`);
    this.name = 'JsonSyntaxError';
    Object.setPrototypeOf(this, JsonSyntaxError.prototype);
  }
}

/**
 * Well-formed JSON whose structure does not match the target type: wrong
 * node kind, missing required field, non-integer for an integer field or
 * an unparseable datetime.
 */
export class ShapeMismatchError extends Bo4eError {
  readonly kind = 'shape_mismatch' as const;

  constructor(
    public readonly typeName: string,
    public readonly path: FieldPath,
    public readonly expected: string,
    public readonly found: string,
  ) {
    super(`${typeName}: expected ${expected} at ${formatPath(path)}, found ${found}`);
    this.name = 'ShapeMismatchError';
    Object.setPrototypeOf(this, ShapeMismatchError.prototype);
  }
}

export class UnknownEnumTokenError extends Bo4eError {
  readonly kind = 'unknown_enum_token' as const;

  constructor(
    public readonly token: string,
    public readonly enumName: string,
    public readonly field: string,
    public readonly path: FieldPath,
  ) {
    super(`Unknown ${enumName} token "${token}" in field ${field} at ${formatPath(path)}`);
    this.name = 'UnknownEnumTokenError';
    Object.setPrototypeOf(this, UnknownEnumTokenError.prototype);
  }
}

export type OwnershipViolation = 'consumed' | 'leased' | 'shared_memory' | 'already_adopted';

/** The in-place decoder was handed a buffer it cannot exclusively own. */
export class BufferOwnershipError extends Bo4eError {
  readonly kind = 'buffer_ownership' as const;

  constructor(public readonly reason: OwnershipViolation) {
    super(`Buffer cannot be decoded in place: ${reason.replace('_', ' ')}`);
    this.name = 'BufferOwnershipError';
    Object.setPrototypeOf(this, BufferOwnershipError.prototype);
  }
}

/** The in-memory record cannot be written: it fails its schema or holds a non-finite number. */
export class EncodeError extends Bo4eError {
  readonly kind = 'encode' as const;

  constructor(
    public readonly typeName: string,
    public readonly path: FieldPath,
    message: string,
  ) {
    super(`${typeName}: cannot encode ${formatPath(path)}: ${message}`);
    this.name = 'EncodeError';
    Object.setPrototypeOf(this, EncodeError.prototype);
  }
}

export class InvalidConfigError extends Bo4eError {
  readonly kind = 'invalid_config' as const;

  constructor(message: string) {
    super(`Invalid serialize options: ${message}`);
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

export type DecodeError =
  | JsonSyntaxError
  | ShapeMismatchError
  | UnknownEnumTokenError
  | BufferOwnershipError;

export type DecodeErrorKind = DecodeError['kind'];

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

export function decodeOk<T>(value: T): DecodeResult<T> {
  return { ok: true, value };
}

export function decodeFail<T>(error: DecodeError): DecodeResult<T> {
  return { ok: false, error };
}

/** Returns the decoded value or throws the decode error. */
export function unwrapDecode<T>(result: DecodeResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
