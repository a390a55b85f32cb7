export * from './rule-set.js';
export * from './line-source.js';
export * from './types.js';
