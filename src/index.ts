/**
 * bo4e-codec: BO4E business objects as JSON, in German or English field
 * naming.
 *
 * ```ts
 * import { meterType, toJsonGerman, decode } from 'bo4e-codec';
 *
 * const json = toJsonGerman(meterType, { meta: {}, meterNumber: '1EMH0012345678' });
 * // {"zaehlernummer":"1EMH0012345678"}
 * const result = decode(meterType, json);
 * ```
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
