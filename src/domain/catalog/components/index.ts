export * from './address.js';
export * from './geo-coordinates.js';
export * from './hardware.js';
export * from './meter-register.js';
