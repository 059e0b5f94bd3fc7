// src/index.ts

export * from './core/types.js';
export * from './core/constants.js';
export * from './core/errors.js';
export * from './core/codec/index.js';
export * from './core/model/index.js';
export { findExtensionViolations, validateExtensionNames } from './core/validator.js';
export { SpecLoader } from './core/parser/spec-loader.js';
export { appendPointer, asJsonValue, isJsonObject, kindOf, lastSegment } from './core/utils/index.js';
