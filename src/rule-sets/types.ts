import type { CompiledRule } from '../rule-compilation/types.js';
import type { PatternCompileError } from '../errors.js';

/**
 * Outcome of evaluating a path against one rule set
 */
export const Verdict = {
  /** A rule excluded the path and no later negation cleared it */
  Excluded: 'excluded',
  /** Rules matched the path, but it ended up not excluded */
  Included: 'included',
  /** No rule in the set matched the path */
  Undefined: 'undefined',
} as const;

export type Verdict = (typeof Verdict)[keyof typeof Verdict];

/**
 * A line dropped from a rule set because it failed to compile
 */
export interface InvalidRule {
  /** 1-based line number in the source text */
  line: number;
  error: PatternCompileError;
}

/**
 * Ordered rules from a single ignore file
 */
export interface RuleSet {
  /** Directory relative and anchored patterns resolve against */
  root: string;
  /** Compiled rules in file order */
  rules: readonly CompiledRule[];
  /** Ignore file the rules were read from, or null for in-memory lines */
  source: string | null;
  invalidRules: readonly InvalidRule[];
}

/**
 * Options for building a rule set
 */
export interface RuleSetOptions {
  /** Override the root directory (defaults to the ignore file's directory) */
  root?: string;
}

/**
 * Function signatures for rule set operations
 */

/**
 * Build a rule set from raw ignore-file lines
 * @param root Directory the rules are scoped to
 * @param lines Raw lines; blanks and comments are skipped
 * @param source Where the lines came from, for diagnostics
 */
export type CreateRuleSetFunction = (
  root: string,
  lines: readonly string[],
  source?: string | null
) => RuleSet;

/**
 * Evaluate a path against a single rule set
 * @param ruleSet Rule set to evaluate
 * @param candidatePath Absolute path, or a path relative to the rule set's root
 * @param isDirectory Whether the candidate is a directory
 */
export type EvaluatePathFunction = (
  ruleSet: RuleSet,
  candidatePath: string,
  isDirectory: boolean
) => Verdict;
