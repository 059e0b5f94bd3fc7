// src/core/types.ts

/**
 * @fileoverview
 * Central re-export of the value-tree, codec and configuration types shared by the decoder,
 * the document model and the CLI.
 */
export * from './types/index.js';
