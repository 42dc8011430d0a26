import type { Logger } from 'pino';
import type { TypeDescriptor } from '../domain/schema/descriptor.js';
import {
  decodeInPlace,
  decodeOwnedBytes,
  decodeText,
} from '../infrastructure/in-place/accelerated-decoder.js';
import type { OwnedBuffer } from '../infrastructure/in-place/owned-buffer.js';
import { decode, encode, encodeToString } from './canonical-codec.js';
import type { DecodeResult } from './errors.js';
import { resolveSerializeConfig } from './serialize-config.js';
import type { SerializeConfig, SerializeOptions } from './serialize-config.js';

/**
 * Codec bound to one type, one set of serialize options and a logger.
 *
 * Encoding uses the bound options; decoding accepts either convention.
 *
 * ```ts
 * const meters = new RecordCodec(meterType, logger, { convention: 'english' });
 * const bytes = meters.encode(meter);
 * const result = meters.decodeInPlace(OwnedBuffer.copyOf(bytes));
 * ```
 */
export class RecordCodec<T> {
  readonly config: SerializeConfig;

  constructor(
    readonly type: TypeDescriptor<T>,
    private readonly log: Logger,
    options?: SerializeOptions,
  ) {
    this.config = resolveSerializeConfig(options);
  }

  /** Returns a codec for the same type with different options. */
  withOptions(options: SerializeOptions): RecordCodec<T> {
    return new RecordCodec(this.type, this.log, { ...this.config, ...options });
  }

  encode(record: T): Uint8Array {
    return encode(this.type, record, this.config);
  }

  encodeToString(record: T): string {
    return encodeToString(this.type, record, this.config);
  }

  decode(input: Uint8Array | string): DecodeResult<T> {
    return decode(this.type, input, this.log);
  }

  decodeInPlace(buffer: OwnedBuffer): DecodeResult<T> {
    return decodeInPlace(this.type, buffer, this.log);
  }

  decodeText(text: string): DecodeResult<T> {
    return decodeText(this.type, text, this.log);
  }

  decodeOwnedBytes(bytes: Uint8Array): DecodeResult<T> {
    return decodeOwnedBytes(this.type, bytes, this.log);
  }
}
