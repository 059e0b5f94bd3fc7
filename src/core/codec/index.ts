export * from './primitives.js';
export * from './partitioned.js';
export * from './reference.js';
