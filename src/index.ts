/**
 * gitignore-resolver - Decide whether paths are excluded by .gitignore rules
 *
 * This package compiles `.gitignore`-format lines into rules, evaluates paths
 * against the ordered rules of one ignore file, and resolves exclusion across
 * every ignore file in a directory tree, where the ignore file nearest to a
 * path decides its fate. It never calls git: a directory tree and the ignore
 * files in it are all it needs.
 *
 * @example Checking paths
 * ```typescript
 * import { createHierarchy, isIgnored } from 'gitignore-resolver';
 *
 * const hierarchy = createHierarchy('./my-repo');
 *
 * isIgnored(hierarchy, 'build', true);          // directory
 * isIgnored(hierarchy, 'src/app.log', false);   // file
 * ```
 *
 * @example Single ignore file
 * ```typescript
 * import { createRuleSet, evaluatePath } from 'gitignore-resolver';
 *
 * const ruleSet = createRuleSet('/repo', ['*.log', '!keep.log']);
 *
 * evaluatePath(ruleSet, 'debug.log', false); // 'excluded'
 * evaluatePath(ruleSet, 'keep.log', false);  // 'included'
 * evaluatePath(ruleSet, 'notes.txt', false); // 'undefined'
 * ```
 *
 * @example Listing included files
 * ```typescript
 * import { listIncludedPaths } from 'gitignore-resolver';
 *
 * for (const file of listIncludedPaths('./my-repo')) {
 *   console.log(file);
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './api.js';
export * from './errors.js';
export * from './rule-compilation/index.js';
export * from './rule-sets/index.js';
export * from './hierarchy/index.js';
export * from './tree-walking/index.js';
