import type { Logger } from 'pino';
import type { TypeDescriptor } from '../../domain/schema/descriptor.js';
import { BufferOwnershipError, decodeFail } from '../../application/errors.js';
import type { DecodeResult } from '../../application/errors.js';
import { logDecodeFailure, materialize } from '../../application/tree-decoder.js';
import { scanInPlace } from './json-scanner.js';
import { OwnedBuffer } from './owned-buffer.js';

function rejectOwnership<T>(
  type: TypeDescriptor<T>,
  error: BufferOwnershipError,
  log: Logger | undefined,
): DecodeResult<T> {
  log?.debug({ type: type.name, reason: error.reason }, 'Rejected buffer without exclusive ownership');
  return decodeFail(error);
}

/**
 * Decodes a record from an exclusively owned buffer, rewriting it in place.
 *
 * Results match the canonical `decode` for the same bytes. The buffer is
 * consumed by the call whatever the outcome; passing it again yields a
 * `BufferOwnershipError`.
 */
export function decodeInPlace<T>(
  type: TypeDescriptor<T>,
  buffer: OwnedBuffer,
  log?: Logger,
): DecodeResult<T> {
  const bytes = buffer.lease();
  if (bytes instanceof BufferOwnershipError) return rejectOwnership(type, bytes, log);

  try {
    const scanned = scanInPlace(bytes);
    const result = scanned.ok ? materialize(type, scanned.value, log) : decodeFail<T>(scanned.error);
    if (!result.ok) logDecodeFailure(log, type, result.error);
    return result;
  } finally {
    buffer.consume();
  }
}

/** Copies `text` into a private buffer and decodes it in place. */
export function decodeText<T>(type: TypeDescriptor<T>, text: string, log?: Logger): DecodeResult<T> {
  return decodeInPlace(type, OwnedBuffer.copyOf(text), log);
}

/**
 * Takes over `bytes` without copying and decodes them in place. The caller
 * gives up the array: its contents afterwards are unspecified.
 */
export function decodeOwnedBytes<T>(
  type: TypeDescriptor<T>,
  bytes: Uint8Array,
  log?: Logger,
): DecodeResult<T> {
  let buffer: OwnedBuffer;
  try {
    buffer = OwnedBuffer.adopt(bytes);
  } catch (err: unknown) {
    if (err instanceof BufferOwnershipError) return rejectOwnership(type, err, log);
    throw err;
  }
  return decodeInPlace(type, buffer, log);
}
