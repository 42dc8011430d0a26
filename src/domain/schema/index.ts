export { ENVELOPE_KEY, defineType, describeFieldKind, getType, listTypes } from './descriptor.js';
export type {
  FieldDescriptor,
  FieldKind,
  RecordOf,
  TypeCategory,
  TypeDefinition,
  TypeDescriptor,
} from './descriptor.js';
export { defineEnum, enumForSchema, listEnums, resolveEnumToken } from './enum.js';
export type { EnumDescriptor } from './enum.js';
export {
  additionalAttributeSchema,
  additionalAttributeType,
  metaEnvelope,
  metaSchema,
} from './envelope.js';
export type { AdditionalAttribute, Bo4eMeta } from './envelope.js';
export { describeJsonKind, isJsonObject, isJsonValue, jsonValueSchema } from './json-value.js';
export type { JsonValue } from './json-value.js';
export { NAMING_CONVENTIONS, buildNamingTables, resolveWireName, wireName } from './naming.js';
export type { NamingConvention, NamingTables, Named, ResolvedField } from './naming.js';
