import picomatch from 'picomatch';
import { PatternCompileError, describeCause } from '../errors.js';
import { normalizeRoot } from './paths.js';
import type {
  CompiledRule,
  CompileResult,
  CompileRuleFunction,
  ParsedRuleLine,
  RuleMatchesFunction,
} from './types.js';

/**
 * Matching options shared by every rule. `bash` is set per rule: in bash mode a
 * single `*` also matches `/`, which is what unanchored rules need.
 */
const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  nocase: true,
  dot: true,
  nobrace: true,
  noextglob: true,
  strictBrackets: true,
};

/** Characters the ignore format treats literally but picomatch would interpret */
const LITERAL_SPECIALS = new Set(['(', ')', '{', '}', '|', '+', '$', '^', ']']);

/** Characters escaped when a root directory is spliced into a glob */
const ROOT_SPECIALS = /[*?[\]{}()!|+@$^\\]/g;

type PreparedGlob = { ok: true; glob: string } | { ok: false; reason: string };

/**
 * Compile one ignore-file line into a rule scoped to `root`
 *
 * @example
 * ```typescript
 * const result = compileRule('/build/', '/repo');
 * if (result.ok) {
 *   result.rule.matcherText; // '/repo/build'
 *   result.rule.directoryOnly; // true
 * }
 * ```
 */
export const compileRule: CompileRuleFunction = (rawLine: string, root: string): CompileResult => {
  const parsed = parseRuleLine(rawLine);

  if (!parsed.pattern) {
    return { ok: false, error: new PatternCompileError(rawLine, 'pattern is empty') };
  }

  const prepared = prepareGlob(parsed.pattern);
  if (!prepared.ok) {
    return { ok: false, error: new PatternCompileError(rawLine, prepared.reason) };
  }

  const matcherText = buildMatcherText({ ...parsed, pattern: prepared.glob }, root);

  let matcher: (absolutePath: string) => boolean;
  try {
    matcher = compileMatcher(matcherText, parsed.anchored);
  } catch (error) {
    return { ok: false, error: new PatternCompileError(rawLine, describeCause(error)) };
  }

  const rule: CompiledRule = Object.freeze({
    ...parsed,
    source: rawLine,
    matcherText,
    matcher,
  });

  return { ok: true, rule };
};

/**
 * Extract flags from a raw line without compiling it
 *
 * Steps run in a fixed order: trailing whitespace, trailing `/`, anchoring,
 * then negation. Anchoring looks at the text after the `!` is removed.
 */
export function parseRuleLine(rawLine: string): ParsedRuleLine {
  let pattern = trimTrailingWhitespace(rawLine);

  const directoryOnly = pattern.endsWith('/') && !pattern.endsWith('\\/');
  if (directoryOnly) {
    pattern = pattern.slice(0, -1);
  }

  const negation = pattern.startsWith('!');
  if (negation) {
    pattern = pattern.slice(1).trimStart();
  }

  const anchored = pattern.includes('/');

  return { pattern, anchored, directoryOnly, negation };
}

/**
 * Build the absolute glob text a rule is compiled from
 * @param parsed Parsed line whose pattern is already escaped for picomatch
 * @param root Directory the rule is scoped to
 */
export function buildMatcherText(parsed: ParsedRuleLine, root: string): string {
  if (parsed.anchored) {
    const base = escapeRoot(normalizeRoot(root).replace(/\/$/, ''));
    const separator = parsed.pattern.startsWith('/') ? '' : '/';
    return `${base}${separator}${parsed.pattern}`;
  }

  return parsed.pattern.startsWith('*') ? parsed.pattern : `*${parsed.pattern}`;
}

/**
 * Check whether a rule's glob matches a path. A directory-only rule never
 * matches something that is not a directory.
 */
export const ruleMatches: RuleMatchesFunction = (
  rule: CompiledRule,
  absolutePath: string,
  isDirectory: boolean
): boolean => {
  if (rule.directoryOnly && !isDirectory) {
    return false;
  }
  return rule.matcher(absolutePath);
};

/**
 * Compile glob text into a path predicate. A trailing `/**` only matches
 * paths strictly beneath its prefix, never the prefix itself.
 */
function compileMatcher(matcherText: string, anchored: boolean): (absolutePath: string) => boolean {
  const options: picomatch.PicomatchOptions = { ...GLOB_OPTIONS, bash: !anchored };
  const isMatch = picomatch(matcherText, options);

  const prefix = matcherText.endsWith('/**') ? matcherText.slice(0, -3) : '';
  if (!prefix) {
    return isMatch;
  }

  const isPrefix = picomatch(prefix, options);
  return absolutePath => isMatch(absolutePath) && !isPrefix(absolutePath);
}

/**
 * Remove trailing spaces and tabs unless the last one is backslash-escaped
 */
function trimTrailingWhitespace(line: string): string {
  let end = line.length;
  while (end > 0 && /[ \t\r]/.test(line[end - 1])) {
    if (end >= 2 && line[end - 2] === '\\') {
      break;
    }
    end--;
  }
  return line.slice(0, end);
}

/**
 * Escape characters that are literal in ignore files and validate bracket
 * expressions. `[!...]` is rewritten to the `[^...]` form.
 */
function prepareGlob(pattern: string): PreparedGlob {
  if (/(^|[^\\])(\\\\)*\\$/.test(pattern)) {
    return { ok: false, reason: 'trailing backslash escapes nothing' };
  }

  let glob = '';
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index];

    if (char === '\\') {
      glob += pattern.slice(index, index + 2);
      index += 2;
      continue;
    }

    if (char === '[') {
      const close = findBracketClose(pattern, index);
      if (close === -1) {
        return { ok: false, reason: `unterminated bracket expression at offset ${index}` };
      }
      glob += rewriteBracket(pattern.slice(index, close + 1));
      index = close + 1;
      continue;
    }

    glob += LITERAL_SPECIALS.has(char) ? `\\${char}` : char;
    index++;
  }

  return { ok: true, glob };
}

/**
 * Index of the `]` closing the bracket expression opened at `open`, or -1.
 * A `]` immediately after `[`, `[!` or `[^` is a member, not the terminator.
 */
function findBracketClose(pattern: string, open: number): number {
  let index = open + 1;
  if (pattern[index] === '!' || pattern[index] === '^') {
    index++;
  }
  if (pattern[index] === ']') {
    index++;
  }

  while (index < pattern.length) {
    if (pattern[index] === '\\') {
      index += 2;
      continue;
    }
    if (pattern.startsWith('[:', index)) {
      const classEnd = pattern.indexOf(':]', index + 2);
      if (classEnd !== -1) {
        index = classEnd + 2;
        continue;
      }
    }
    if (pattern[index] === ']') {
      return index;
    }
    index++;
  }

  return -1;
}

function rewriteBracket(bracket: string): string {
  let body = bracket.slice(1, -1);
  let prefix = '[';

  if (body.startsWith('!') || body.startsWith('^')) {
    prefix = '[^';
    body = body.slice(1);
  }
  if (body.startsWith(']')) {
    body = `\\${body}`;
  }

  return `${prefix}${body}]`;
}

function escapeRoot(root: string): string {
  return root.replace(ROOT_SPECIALS, '\\$&');
}
