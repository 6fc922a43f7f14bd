export * from './base-error.js';
export * from './configuration.error.js';
export * from './validation.error.js';
