// Re-export everything from sub-modules
export * from './string.js';
export * from './pointer.js';
export * from './json.js';
