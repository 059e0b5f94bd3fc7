export * from './value.js';
export * from './codec.js';
export * from './config.js';
