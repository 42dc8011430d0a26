import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Creates a pino logger. Level comes from `LOG_LEVEL`, default `info`.
 *
 * The codec itself only logs at `trace` (ignored unknown fields) and
 * `debug` (failed decodes, rejected buffers).
 */
export function createLogger(name = 'bo4e-codec', env: NodeJS.ProcessEnv = process.env): Logger {
  return pino({ name, level: env['LOG_LEVEL'] ?? 'info' });
}
