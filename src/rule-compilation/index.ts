export * from './rule-compiler.js';
export * from './paths.js';
export * from './types.js';
