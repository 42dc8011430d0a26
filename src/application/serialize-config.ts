import { z } from 'zod';
import { NAMING_CONVENTIONS } from '../domain/schema/naming.js';
import { InvalidConfigError } from './errors.js';

/**
 * Options recognized by the encoder.
 *
 * `convention` selects wire names on output only; decoding accepts either
 * convention regardless. `pretty` changes whitespace and nothing else.
 */
export const serializeConfigSchema = z.object({
  convention: z.enum(NAMING_CONVENTIONS).default('german'),
  pretty: z.boolean().default(false),
}).strict();

export type SerializeConfig = z.infer<typeof serializeConfigSchema>;

/** Partial options as callers pass them; missing keys take the defaults. */
export type SerializeOptions = z.input<typeof serializeConfigSchema>;

export const DEFAULT_SERIALIZE_CONFIG: SerializeConfig = Object.freeze({
  convention: 'german',
  pretty: false,
});

/**
 * Validates caller options and fills in defaults.
 * Throws {@link InvalidConfigError} for unknown keys or values.
 */
export function resolveSerializeConfig(options?: SerializeOptions): SerializeConfig {
  if (options === undefined) return DEFAULT_SERIALIZE_CONFIG;

  const parsed = serializeConfigSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<options>'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(detail);
  }
  return parsed.data;
}

export function germanConfig(): SerializeConfig {
  return { convention: 'german', pretty: false };
}

export function englishConfig(): SerializeConfig {
  return { convention: 'english', pretty: false };
}

export function withPretty(config: SerializeConfig, pretty = true): SerializeConfig {
  return { ...config, pretty };
}
