export { loadSerializeConfig } from './config.js';
export { createLogger } from './logger.js';
export { OwnedBuffer, decodeInPlace, decodeOwnedBytes, decodeText, scanInPlace } from './in-place/index.js';
export type { OwnedBufferState, ScanResult } from './in-place/index.js';
