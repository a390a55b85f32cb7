import type { IoError } from '../errors.js';
import type { RuleSet, Verdict } from '../rule-sets/types.js';

/**
 * Options controlling how ignore files are discovered under a repository root
 */
export interface HierarchyOptions {
  /** Name of the ignore files to load (defaults to .gitignore) */
  ignoreFileName?: string;
  /** Directory names never searched for ignore files (defaults to .git) */
  skipDirectories?: string[];
}

/**
 * An ignore file or directory left out of the hierarchy because it could not be read
 */
export interface DiscoveryFailure {
  path: string;
  error: IoError;
}

export interface DiscoveryResult {
  /** Absolute paths of every ignore file found, sorted */
  ignoreFiles: string[];
  failures: DiscoveryFailure[];
}

/**
 * Every ignore file under a repository root, keyed by the directory containing it
 */
export interface Hierarchy {
  /** Normalized absolute repository root */
  root: string;
  ignoreFileName: string;
  /** Rule sets keyed by their normalized directory */
  ruleSets: ReadonlyMap<string, RuleSet>;
  failures: readonly DiscoveryFailure[];
}

/**
 * Function signatures for hierarchy operations
 */

/**
 * Build a hierarchy by discovering and loading every ignore file under a root
 * @param root Repository root directory
 * @param options Discovery options
 * @throws IoError if the root itself cannot be read
 */
export type CreateHierarchyFunction = (root: string, options?: HierarchyOptions) => Hierarchy;

/**
 * Resolve a path's verdict across the hierarchy, nearest ignore file first
 * @param hierarchy Hierarchy to consult
 * @param candidatePath Absolute path, or a path relative to the repository root
 * @param isDirectory Whether the candidate is a directory
 */
export type ResolveVerdictFunction = (
  hierarchy: Hierarchy,
  candidatePath: string,
  isDirectory: boolean
) => Verdict;
