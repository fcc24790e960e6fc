// packages/utils/src/index.ts
export * from './bytes.js';
export * from './json.js';
export * from './hash.js';
export * from './trace.js';
export * from './log.js';
