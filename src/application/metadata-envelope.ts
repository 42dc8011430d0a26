import type { TypeDescriptor } from '../domain/schema/descriptor.js';
import { metaEnvelope } from '../domain/schema/envelope.js';
import type { Bo4eMeta } from '../domain/schema/envelope.js';
import type { JsonValue } from '../domain/schema/json-value.js';
import type { NamingConvention } from '../domain/schema/naming.js';
import { writeFields } from './wire-encoder.js';
import type { JsonObject } from './wire-encoder.js';

export type WireEntry = readonly [name: string, value: JsonValue];

/**
 * Wire entries of the present envelope attributes, in declaration order:
 * `_typ`, `_version`, `_id`, then the additional attributes list.
 * Absent attributes produce no entry.
 */
export function flattenEnvelope(meta: Bo4eMeta, convention: NamingConvention): WireEntry[] {
  const out: JsonObject = {};
  writeFields(metaEnvelope.name, metaEnvelope, meta, convention, [], out);
  return Object.entries(out);
}

export interface EnvelopeOptions {
  version?: string;
  id?: string;
}

/**
 * Builds an envelope whose `_typ` discriminator names `type` in the given
 * convention: `Zaehler` under German, `Meter` under English.
 */
export function envelopeFor(
  type: TypeDescriptor,
  convention: NamingConvention = 'german',
  options: EnvelopeOptions = {},
): Bo4eMeta {
  const meta: Bo4eMeta = { typ: convention === 'german' ? type.germanName : type.name };
  if (options.version !== undefined) meta.version = options.version;
  if (options.id !== undefined) meta.id = options.id;
  return meta;
}
