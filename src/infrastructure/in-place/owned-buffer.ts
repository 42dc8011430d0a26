import { BufferOwnershipError } from '../../application/errors.js';

export type OwnedBufferState = 'ready' | 'leased' | 'consumed';

const adoptedViews = new WeakSet<Uint8Array>();

function isShared(bytes: Uint8Array): boolean {
  return typeof SharedArrayBuffer !== 'undefined' && bytes.buffer instanceof SharedArrayBuffer;
}

/**
 * Bytes the in-place decoder may rewrite.
 *
 * The decoder compacts string escapes inside the buffer, so it must be the
 * only party holding the bytes. An `OwnedBuffer` is created either from a
 * private copy ({@link OwnedBuffer.copyOf}) or by taking over a caller's
 * array ({@link OwnedBuffer.adopt}), which the caller must not touch again.
 *
 * Each buffer supports exactly one decode: it is leased for the duration
 * of the call and consumed afterwards. Contents after a decode are
 * unspecified.
 */
export class OwnedBuffer {
  private state: OwnedBufferState = 'ready';

  private constructor(private readonly bytes: Uint8Array) {}

  /** Copies text (as UTF-8) or bytes into a fresh, exclusively owned buffer. */
  static copyOf(input: string | Uint8Array): OwnedBuffer {
    if (typeof input === 'string') {
      return new OwnedBuffer(new TextEncoder().encode(input));
    }
    return new OwnedBuffer(new Uint8Array(input));
  }

  /**
   * Takes ownership of `bytes` without copying.
   *
   * Throws {@link BufferOwnershipError} for memory backed by a
   * `SharedArrayBuffer` (other threads could observe the rewrite) and for an
   * array that was already adopted.
   */
  static adopt(bytes: Uint8Array): OwnedBuffer {
    if (isShared(bytes)) throw new BufferOwnershipError('shared_memory');
    if (adoptedViews.has(bytes)) throw new BufferOwnershipError('already_adopted');
    adoptedViews.add(bytes);
    return new OwnedBuffer(bytes);
  }

  get status(): OwnedBufferState {
    return this.state;
  }

  get byteLength(): number {
    return this.bytes.byteLength;
  }

  /**
   * Leases the bytes for one decode. Returns the violation instead when the
   * buffer is already leased or consumed.
   */
  lease(): Uint8Array | BufferOwnershipError {
    if (this.state === 'consumed') return new BufferOwnershipError('consumed');
    if (this.state === 'leased') return new BufferOwnershipError('leased');
    this.state = 'leased';
    return this.bytes;
  }

  /** Ends the lease; the buffer cannot be decoded again. */
  consume(): void {
    this.state = 'consumed';
  }
}
