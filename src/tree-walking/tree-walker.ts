import { readdirSync, type Dirent } from 'node:fs';
import path from 'node:path';
import { IoError } from '../errors.js';
import { toPosixPath } from '../rule-compilation/paths.js';
import { isIgnored } from '../hierarchy/hierarchy-resolver.js';
import type { Hierarchy } from '../hierarchy/types.js';
import { isPathIgnored } from '../rule-sets/rule-set.js';
import type { RuleSet } from '../rule-sets/types.js';
import type { ExclusionCheck, WalkOptions } from './types.js';

const DEFAULT_WALK_OPTIONS: Required<Pick<WalkOptions, 'skipNames'>> = {
  skipNames: ['.git'],
};

/**
 * List every path under `root` that is not excluded
 *
 * Excluded directories are not descended into. Directories that cannot be read
 * are skipped and traversal continues, so the result may be partial. Symbolic
 * links are reported but never followed.
 *
 * @returns Sorted absolute paths with `/` separators
 */
export function walkIncludedPaths(
  root: string,
  isExcluded: ExclusionCheck,
  options: WalkOptions = {}
): string[] {
  const skipNames = options.skipNames ?? DEFAULT_WALK_OPTIONS.skipNames;
  const included: string[] = [];
  const pending: string[] = [path.resolve(root)];

  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: Dirent[];
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      options.onSkip?.(new IoError(dir, error));
      continue;
    }

    for (const entry of entries) {
      if (skipNames.includes(entry.name)) {
        continue;
      }

      const entryPath = path.join(dir, entry.name);
      const isDirectory = entry.isDirectory();
      const absolutePath = toPosixPath(entryPath);

      if (isExcluded(absolutePath, isDirectory)) {
        continue;
      }

      included.push(absolutePath);
      if (isDirectory) {
        pending.push(entryPath);
      }
    }
  }

  return included.sort();
}

/**
 * Every path under the repository root not excluded by the hierarchy
 */
export function includedPaths(hierarchy: Hierarchy, options: WalkOptions = {}): string[] {
  return walkIncludedPaths(
    hierarchy.root,
    (absolutePath, isDirectory) => isIgnored(hierarchy, absolutePath, isDirectory),
    options
  );
}

/**
 * Single-file variant: every path under the rule set's root not excluded by it
 */
export function includedPathsForRuleSet(ruleSet: RuleSet, options: WalkOptions = {}): string[] {
  return walkIncludedPaths(
    ruleSet.root,
    (absolutePath, isDirectory) => isPathIgnored(ruleSet, absolutePath, isDirectory),
    options
  );
}
