export * from './business-partner-role.js';
export * from './country.js';
export * from './customer-type.js';
export * from './device-category.js';
export * from './device-type.js';
export * from './division.js';
export * from './energy-direction.js';
export * from './meter-size.js';
export * from './meter-type.js';
export * from './register-type.js';
export * from './unit.js';
