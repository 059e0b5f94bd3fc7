export * from './server.js';
export * from './parameter.js';
export * from './operation.js';
export * from './path-item.js';
export * from './paths.js';
export * from './document.js';
