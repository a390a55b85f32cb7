import { statSync } from 'node:fs';
import path from 'node:path';
import { resolveCandidatePath } from './rule-compilation/paths.js';
import { evaluatePath, loadRuleSet } from './rule-sets/rule-set.js';
import { Verdict } from './rule-sets/types.js';
import type { RuleSet } from './rule-sets/types.js';
import {
  createHierarchy,
  DEFAULT_HIERARCHY_OPTIONS,
  resolveVerdict,
} from './hierarchy/hierarchy-resolver.js';
import type { Hierarchy, HierarchyOptions } from './hierarchy/types.js';
import { includedPaths, includedPathsForRuleSet } from './tree-walking/tree-walker.js';
import type { WalkOptions } from './tree-walking/types.js';

/**
 * Options shared by the convenience API
 */
export interface ResolveOptions extends HierarchyOptions {
  /** Only consult the ignore file at the root, ignoring nested ones */
  single?: boolean;
}

export interface CheckOptions extends ResolveOptions {
  /** Override the directory flag read from the filesystem */
  directory?: boolean;
}

/**
 * Result of checking a single path
 */
export interface PathCheck {
  /** The path as it was passed in */
  path: string;
  /** Absolute path the verdict was computed for */
  absolutePath: string;
  isDirectory: boolean;
  verdict: Verdict;
  /** Whether the path is excluded */
  ignored: boolean;
}

/**
 * The rules a check or walk consults: every ignore file under the root, or the
 * root's ignore file alone
 */
export type Resolver = { kind: 'hierarchy'; hierarchy: Hierarchy } | { kind: 'single'; ruleSet: RuleSet };

/**
 * Check several paths against the ignore files under `root`
 *
 * The directory flag of each path is read from the filesystem; paths that do
 * not exist are treated as files unless `options.directory` is set.
 *
 * @example
 * ```typescript
 * import { checkPaths } from 'gitignore-resolver';
 *
 * for (const check of checkPaths('.', ['dist', 'src/index.ts'])) {
 *   console.log(`${check.path}: ${check.verdict}`);
 * }
 * ```
 *
 * @throws IoError if the root (or, with `single`, its ignore file) cannot be read
 */
export function checkPaths(
  root: string,
  candidatePaths: readonly string[],
  options: CheckOptions = {}
): PathCheck[] {
  return checkPathsWith(createResolver(root, options), candidatePaths, options);
}

/**
 * Check several paths against a resolver built earlier, so its rules are
 * loaded only once. Relative paths resolve against the resolver's root.
 */
export function checkPathsWith(
  resolver: Resolver,
  candidatePaths: readonly string[],
  options: Pick<CheckOptions, 'directory'> = {}
): PathCheck[] {
  const rootDir = resolverRoot(resolver);

  return candidatePaths.map(candidatePath => {
    const absolutePath = resolveCandidatePath(candidatePath, rootDir);
    const isDirectory = options.directory ?? isExistingDirectory(absolutePath);
    const verdict =
      resolver.kind === 'hierarchy'
        ? resolveVerdict(resolver.hierarchy, absolutePath, isDirectory)
        : evaluatePath(resolver.ruleSet, absolutePath, isDirectory);

    return {
      path: candidatePath,
      absolutePath,
      isDirectory,
      verdict,
      ignored: verdict === Verdict.Excluded,
    };
  });
}

/**
 * Check one path against the ignore files under `root`
 */
export function checkPath(root: string, candidatePath: string, options: CheckOptions = {}): PathCheck {
  const [check] = checkPaths(root, [candidatePath], options);
  return check;
}

/**
 * List every path under `root` that is not excluded
 * @returns Sorted absolute paths
 */
export function listIncludedPaths(root: string, options: ResolveOptions & WalkOptions = {}): string[] {
  return listIncludedPathsWith(createResolver(root, options), options);
}

/**
 * List every path under a resolver's root that it does not exclude
 */
export function listIncludedPathsWith(resolver: Resolver, options: WalkOptions = {}): string[] {
  return resolver.kind === 'hierarchy'
    ? includedPaths(resolver.hierarchy, options)
    : includedPathsForRuleSet(resolver.ruleSet, options);
}

/**
 * Load the rules for `root` once, for use with the `*With` functions
 * @throws IoError if the root (or, with `single`, its ignore file) cannot be read
 */
export function createResolver(root: string, options: ResolveOptions = {}): Resolver {
  if (options.single) {
    const ignoreFileName = options.ignoreFileName ?? DEFAULT_HIERARCHY_OPTIONS.ignoreFileName;
    return { kind: 'single', ruleSet: loadRuleSet(path.join(root, ignoreFileName)) };
  }
  return {
    kind: 'hierarchy',
    hierarchy: createHierarchy(root, options),
  };
}

function resolverRoot(resolver: Resolver): string {
  return resolver.kind === 'hierarchy' ? resolver.hierarchy.root : resolver.ruleSet.root;
}

function isExistingDirectory(absolutePath: string): boolean {
  return statSync(absolutePath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
