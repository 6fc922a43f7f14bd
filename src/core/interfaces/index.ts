export * from './result.js';
export type * from './scheduling.types.js';
