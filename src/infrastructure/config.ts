import type { Logger } from 'pino';
import { NAMING_CONVENTIONS } from '../domain/schema/naming.js';
import type { NamingConvention } from '../domain/schema/naming.js';
import { DEFAULT_SERIALIZE_CONFIG } from '../application/serialize-config.js';
import type { SerializeConfig } from '../application/serialize-config.js';

function parseConvention(value: string | undefined): NamingConvention | undefined {
  const normalized = value?.trim().toLowerCase();
  return NAMING_CONVENTIONS.find((convention) => convention === normalized);
}

function parseFlag(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      return undefined;
  }
}

/**
 * Loads serialize options from the environment.
 *
 * - `BO4E_JSON_CONVENTION`: `german` or `english`
 * - `BO4E_JSON_PRETTY`: `true`/`false` (also `1`/`0`, `yes`/`no`)
 *
 * Missing or unrecognized values fall back to the defaults; a warning is
 * logged for the unrecognized ones. Never throws.
 */
export function loadSerializeConfig(
  env: NodeJS.ProcessEnv = process.env,
  log?: Logger,
): SerializeConfig {
  const rawConvention = env['BO4E_JSON_CONVENTION'];
  const rawPretty = env['BO4E_JSON_PRETTY'];

  const convention = parseConvention(rawConvention);
  if (rawConvention !== undefined && convention === undefined) {
    log?.warn({ value: rawConvention }, 'Ignoring unknown BO4E_JSON_CONVENTION');
  }

  const pretty = parseFlag(rawPretty);
  if (rawPretty !== undefined && pretty === undefined) {
    log?.warn({ value: rawPretty }, 'Ignoring invalid BO4E_JSON_PRETTY');
  }

  return {
    convention: convention ?? DEFAULT_SERIALIZE_CONFIG.convention,
    pretty: pretty ?? DEFAULT_SERIALIZE_CONFIG.pretty,
  };
}
