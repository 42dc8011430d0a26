export * from './schema/index.js';
export * from './catalog/index.js';
