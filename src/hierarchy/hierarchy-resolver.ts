import { readdirSync, type Dirent } from 'node:fs';
import path from 'node:path';
import { IoError } from '../errors.js';
import { isWithinRoot, normalizeRoot, resolveCandidatePath } from '../rule-compilation/paths.js';
import { evaluatePath, loadRuleSet } from '../rule-sets/rule-set.js';
import { Verdict, type RuleSet } from '../rule-sets/types.js';
import type {
  CreateHierarchyFunction,
  DiscoveryFailure,
  DiscoveryResult,
  Hierarchy,
  HierarchyOptions,
  ResolveVerdictFunction,
} from './types.js';

/**
 * Default discovery options
 */
export const DEFAULT_HIERARCHY_OPTIONS: Readonly<Required<HierarchyOptions>> = Object.freeze({
  ignoreFileName: '.gitignore',
  skipDirectories: ['.git'],
});

/**
 * Find every ignore file under `root`, at any depth
 *
 * Directories are visited from an explicit worklist. Symbolic links to
 * directories are not followed. A subdirectory that cannot be listed is
 * recorded in `failures` and skipped.
 *
 * @throws IoError if `root` itself cannot be listed
 */
export function discoverIgnoreFiles(root: string, options: HierarchyOptions = {}): DiscoveryResult {
  const opts = resolveHierarchyOptions(options);
  const rootDir = path.resolve(root);
  const ignoreFiles: string[] = [];
  const failures: DiscoveryFailure[] = [];
  const pending: string[] = [rootDir];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === rootDir) {
        throw new IoError(dir, error);
      }
      failures.push({ path: dir, error: new IoError(dir, error) });
      continue;
    }

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!opts.skipDirectories.includes(entry.name)) {
          pending.push(entryPath);
        }
      } else if (entry.name === opts.ignoreFileName && (entry.isFile() || entry.isSymbolicLink())) {
        ignoreFiles.push(entryPath);
      }
    }
  }

  return { ignoreFiles: ignoreFiles.sort(), failures };
}

/**
 * Discover and load every ignore file under a repository root
 *
 * An ignore file that cannot be read is left out and recorded in `failures`;
 * the remaining files still form the hierarchy.
 *
 * @example
 * ```typescript
 * const hierarchy = createHierarchy('/path/to/repo');
 * isIgnored(hierarchy, 'build', true);
 * isIgnored(hierarchy, 'src/index.ts', false);
 * ```
 */
export const createHierarchy: CreateHierarchyFunction = (
  root: string,
  options: HierarchyOptions = {}
): Hierarchy => {
  const opts = resolveHierarchyOptions(options);
  const { ignoreFiles, failures } = discoverIgnoreFiles(root, opts);
  const ruleSets: RuleSet[] = [];

  for (const ignoreFile of ignoreFiles) {
    try {
      ruleSets.push(loadRuleSet(ignoreFile));
    } catch (error) {
      if (!(error instanceof IoError)) {
        throw error;
      }
      failures.push({ path: ignoreFile, error });
    }
  }

  return buildHierarchy(root, ruleSets, opts.ignoreFileName, failures);
};

/**
 * Assemble a hierarchy from rule sets that are already built. When two rule
 * sets share a root, the later one replaces the earlier.
 */
export function createHierarchyFromRuleSets(
  root: string,
  ruleSets: readonly RuleSet[],
  ignoreFileName: string = DEFAULT_HIERARCHY_OPTIONS.ignoreFileName
): Hierarchy {
  return buildHierarchy(root, ruleSets, ignoreFileName, []);
}

/**
 * Directories whose ignore files apply to a path, nearest first: from the
 * path's parent up to and including the repository root. Empty for paths
 * outside the root, and for the root itself.
 */
export function applicableDirectories(hierarchy: Hierarchy, candidatePath: string): string[] {
  const absolutePath = resolveCandidatePath(candidatePath, hierarchy.root);
  const directories: string[] = [];

  if (absolutePath === hierarchy.root) {
    return directories;
  }

  let dir = path.posix.dirname(absolutePath);
  while (isWithinRoot(dir, hierarchy.root)) {
    directories.push(dir);

    const parent = path.posix.dirname(dir);
    if (dir === hierarchy.root || parent === dir) {
      break;
    }
    dir = parent;
  }

  return directories;
}

/**
 * Walk the applicable ignore files nearest first and return the first verdict
 * that is not `undefined`. Proximity alone decides between files; rule order
 * only matters within one file.
 */
export const resolveVerdict: ResolveVerdictFunction = (
  hierarchy: Hierarchy,
  candidatePath: string,
  isDirectory: boolean
): Verdict => {
  const absolutePath = resolveCandidatePath(candidatePath, hierarchy.root);

  for (const dir of applicableDirectories(hierarchy, absolutePath)) {
    const ruleSet = hierarchy.ruleSets.get(dir);
    if (!ruleSet) {
      continue;
    }

    const verdict = evaluatePath(ruleSet, absolutePath, isDirectory);
    if (verdict !== Verdict.Undefined) {
      return verdict;
    }
  }

  return Verdict.Undefined;
};

/**
 * Whether the hierarchy excludes a path
 */
export function isIgnored(hierarchy: Hierarchy, candidatePath: string, isDirectory: boolean): boolean {
  return resolveVerdict(hierarchy, candidatePath, isDirectory) === Verdict.Excluded;
}

/**
 * Whether a path is excluded itself or sits inside an excluded directory,
 * which is what a traversal that prunes excluded directories observes
 */
export function isIgnoredOrInIgnoredDirectory(
  hierarchy: Hierarchy,
  candidatePath: string,
  isDirectory: boolean
): boolean {
  const absolutePath = resolveCandidatePath(candidatePath, hierarchy.root);
  const ancestors = applicableDirectories(hierarchy, absolutePath).reverse();

  for (const dir of ancestors) {
    if (dir !== hierarchy.root && isIgnored(hierarchy, dir, true)) {
      return true;
    }
  }

  return isIgnored(hierarchy, absolutePath, isDirectory);
}

function resolveHierarchyOptions(options: HierarchyOptions): Required<HierarchyOptions> {
  return {
    ignoreFileName: options.ignoreFileName ?? DEFAULT_HIERARCHY_OPTIONS.ignoreFileName,
    skipDirectories: options.skipDirectories ?? DEFAULT_HIERARCHY_OPTIONS.skipDirectories,
  };
}

function buildHierarchy(
  root: string,
  ruleSets: readonly RuleSet[],
  ignoreFileName: string,
  failures: DiscoveryFailure[]
): Hierarchy {
  const byDirectory = new Map<string, RuleSet>();
  for (const ruleSet of ruleSets) {
    byDirectory.set(ruleSet.root, ruleSet);
  }

  return Object.freeze({
    root: normalizeRoot(root),
    ignoreFileName,
    ruleSets: byDirectory,
    failures: Object.freeze(failures),
  });
}
