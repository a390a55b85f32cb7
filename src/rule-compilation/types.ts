import type { PatternCompileError } from '../errors.js';

/**
 * Flags and cleaned pattern text extracted from one ignore-file line
 */
export interface ParsedRuleLine {
  /** Pattern text with the negation marker and trailing slash removed */
  pattern: string;
  /** Pattern contains a `/`, so it is tied to the ignore file's directory */
  anchored: boolean;
  /** Line ended with `/`; only directories can match */
  directoryOnly: boolean;
  /** Line started with `!`; a match re-includes a previously excluded path */
  negation: boolean;
}

/**
 * A single compiled ignore rule
 */
export interface CompiledRule extends ParsedRuleLine {
  /** The rule text as it appeared in the ignore file */
  source: string;
  /** Absolute glob text the matcher was compiled from */
  matcherText: string;
  /** Tests an absolute, `/`-separated path against the glob */
  matcher: (absolutePath: string) => boolean;
}

export type CompileResult =
  | { ok: true; rule: CompiledRule }
  | { ok: false; error: PatternCompileError };

/**
 * Function signatures for rule compilation operations
 */

/**
 * Compile one ignore-file line against the directory it is scoped to
 * @param rawLine A non-blank, non-comment line
 * @param root Directory that anchored patterns are resolved against
 */
export type CompileRuleFunction = (rawLine: string, root: string) => CompileResult;

/**
 * Check a compiled rule's glob against a candidate path
 * @param rule Compiled rule
 * @param absolutePath Absolute, `/`-separated candidate path
 * @param isDirectory Whether the candidate is a directory
 */
export type RuleMatchesFunction = (
  rule: CompiledRule,
  absolutePath: string,
  isDirectory: boolean
) => boolean;
