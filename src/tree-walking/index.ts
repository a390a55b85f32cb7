export * from './tree-walker.js';
export * from './types.js';
