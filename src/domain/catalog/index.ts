export * from './enums/index.js';
export * from './components/index.js';
export * from './records/index.js';
