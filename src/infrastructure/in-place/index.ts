export { decodeInPlace, decodeOwnedBytes, decodeText } from './accelerated-decoder.js';
export { scanInPlace } from './json-scanner.js';
export type { ScanResult } from './json-scanner.js';
export { OwnedBuffer } from './owned-buffer.js';
export type { OwnedBufferState } from './owned-buffer.js';
