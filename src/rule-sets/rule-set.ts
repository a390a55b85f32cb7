import path from 'node:path';
import { compileRule, ruleMatches } from '../rule-compilation/rule-compiler.js';
import { normalizeRoot, resolveCandidatePath } from '../rule-compilation/paths.js';
import type { CompiledRule } from '../rule-compilation/types.js';
import { isRuleLine, readIgnoreLines } from './line-source.js';
import {
  Verdict,
  type CreateRuleSetFunction,
  type EvaluatePathFunction,
  type InvalidRule,
  type RuleSet,
  type RuleSetOptions,
} from './types.js';

/**
 * Build a rule set from raw lines. Blank and comment lines are skipped; a line
 * that fails to compile is dropped and recorded in `invalidRules`.
 */
export const createRuleSet: CreateRuleSetFunction = (
  root: string,
  lines: readonly string[],
  source: string | null = null
): RuleSet => {
  const normalizedRoot = normalizeRoot(root);
  const rules: CompiledRule[] = [];
  const invalidRules: InvalidRule[] = [];

  lines.forEach((line, index) => {
    if (!isRuleLine(line)) {
      return;
    }

    const result = compileRule(line, normalizedRoot);
    if (result.ok) {
      rules.push(result.rule);
    } else {
      invalidRules.push({ line: index + 1, error: result.error });
    }
  });

  return Object.freeze({
    root: normalizedRoot,
    rules: Object.freeze(rules),
    source,
    invalidRules: Object.freeze(invalidRules),
  });
};

/**
 * Load a rule set from an ignore file on disk
 * @param ignoreFilePath Path to the ignore file
 * @param options `root` overrides the directory the rules are scoped to
 * @throws IoError if the file cannot be read
 */
export function loadRuleSet(ignoreFilePath: string, options: RuleSetOptions = {}): RuleSet {
  const filePath = path.resolve(ignoreFilePath);
  const root = options.root ?? path.dirname(filePath);
  return createRuleSet(root, readIgnoreLines(filePath), filePath);
}

/**
 * Evaluate a path against one rule set
 *
 * Rules are folded in file order. A negation only ever clears an exclusion set
 * by an earlier rule in the same set, so negations seen while nothing is
 * excluded are skipped. Their matches still count towards telling `included`
 * apart from `undefined`.
 */
export const evaluatePath: EvaluatePathFunction = (
  ruleSet: RuleSet,
  candidatePath: string,
  isDirectory: boolean
): Verdict => {
  const absolutePath = resolveCandidatePath(candidatePath, ruleSet.root);
  let excluded = false;
  let matched = false;

  for (const rule of ruleSet.rules) {
    if (rule.negation && !excluded) {
      if (!matched && ruleMatches(rule, absolutePath, isDirectory)) {
        matched = true;
      }
      continue;
    }

    const hit = ruleMatches(rule, absolutePath, isDirectory);
    if (hit) {
      matched = true;
    }

    // A directory-only rule never hits a file, so its contribution equals its
    // negation flag and the accumulator is left as it was.
    const contribution = rule.negation !== hit;
    excluded = rule.negation ? contribution && excluded : excluded || contribution;
  }

  if (excluded) {
    return Verdict.Excluded;
  }
  return matched ? Verdict.Included : Verdict.Undefined;
};

/**
 * Single-file semantics: whether the rule set excludes the path
 */
export function isPathIgnored(ruleSet: RuleSet, candidatePath: string, isDirectory: boolean): boolean {
  return evaluatePath(ruleSet, candidatePath, isDirectory) === Verdict.Excluded;
}
