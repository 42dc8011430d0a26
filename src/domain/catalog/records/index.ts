export * from './business-partner.js';
export * from './market-location.js';
export * from './meter.js';
export * from './metering-location.js';
