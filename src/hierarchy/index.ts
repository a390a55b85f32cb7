export * from './hierarchy-resolver.js';
export * from './types.js';
