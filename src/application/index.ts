export {
  decode,
  encode,
  encodeToString,
  fromJson,
  toJsonEnglish,
  toJsonGerman,
} from './canonical-codec.js';
export {
  Bo4eError,
  BufferOwnershipError,
  EncodeError,
  InvalidConfigError,
  JsonSyntaxError,
  ShapeMismatchError,
  UnknownEnumTokenError,
  formatPath,
  unwrapDecode,
} from './errors.js';
export type {
  DecodeError,
  DecodeErrorKind,
  DecodeResult,
  FieldPath,
  OwnershipViolation,
} from './errors.js';
export { envelopeFor, flattenEnvelope } from './metadata-envelope.js';
export type { EnvelopeOptions, WireEntry } from './metadata-envelope.js';
export { RecordCodec } from './record-codec.js';
export { JSON_SCHEMA_DIALECT, describeCatalog, describeType } from './schema-dump.js';
export {
  DEFAULT_SERIALIZE_CONFIG,
  englishConfig,
  germanConfig,
  resolveSerializeConfig,
  serializeConfigSchema,
  withPretty,
} from './serialize-config.js';
export type { SerializeConfig, SerializeOptions } from './serialize-config.js';
export { materialize } from './tree-decoder.js';
export type { JsonObject } from './wire-encoder.js';
