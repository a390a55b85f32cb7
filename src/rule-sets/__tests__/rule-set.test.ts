import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createRuleSet, evaluatePath, isPathIgnored, loadRuleSet } from '../rule-set.js';
import { Verdict } from '../types.js';
import { IoError } from '../../errors.js';

const ROOT = '/repo';

function verdictFor(lines: string[], candidate: string, isDirectory = false) {
  return evaluatePath(createRuleSet(ROOT, lines), candidate, isDirectory);
}

describe('rule-set', () => {
  describe('createRuleSet', () => {
    it('should skip blank lines and comments', () => {
      const ruleSet = createRuleSet(ROOT, ['# build output', '', '   ', '*.log', '  # indented', 'build/']);

      expect(ruleSet.rules.map(rule => rule.source)).toEqual(['*.log', 'build/']);
      expect(ruleSet.invalidRules).toHaveLength(0);
      expect(ruleSet.source).toBeNull();
    });

    it('should keep rules in file order', () => {
      const ruleSet = createRuleSet(ROOT, ['b', 'a', '!c']);

      expect(ruleSet.rules.map(rule => rule.source)).toEqual(['b', 'a', '!c']);
    });

    it('should drop malformed lines and keep the rest', () => {
      const ruleSet = createRuleSet(ROOT, ['*.log', 'bad[', '!keep.log']);

      expect(ruleSet.rules.map(rule => rule.source)).toEqual(['*.log', '!keep.log']);
      expect(ruleSet.invalidRules).toHaveLength(1);
      expect(ruleSet.invalidRules[0].line).toBe(2);
      expect(ruleSet.invalidRules[0].error.pattern).toBe('bad[');
      expect(evaluatePath(ruleSet, 'keep.log', false)).toBe(Verdict.Included);
    });

    it('should normalize the root', () => {
      expect(createRuleSet('/repo/', []).root).toBe('/repo');
    });

    it('should keep escaped hashes as rules', () => {
      const ruleSet = createRuleSet(ROOT, ['\\#notes']);

      expect(ruleSet.rules).toHaveLength(1);
      expect(evaluatePath(ruleSet, '#notes', false)).toBe(Verdict.Excluded);
    });
  });

  describe('evaluatePath', () => {
    it('should exclude paths matched by a single rule and leave others undefined', () => {
      expect(verdictFor(['*.log'], 'debug.log')).toBe(Verdict.Excluded);
      expect(verdictFor(['*.log'], 'logs/debug.log')).toBe(Verdict.Excluded);
      expect(verdictFor(['*.log'], 'notes.txt')).toBe(Verdict.Undefined);
    });

    it('should re-include a path negated after the rule that excluded it', () => {
      expect(verdictFor(['*.log', '!keep.log'], 'keep.log')).toBe(Verdict.Included);
      expect(verdictFor(['*.log', '!keep.log'], 'other.log')).toBe(Verdict.Excluded);
    });

    it('should ignore a negation that comes before the exclusion it would cancel', () => {
      expect(verdictFor(['!keep.log', '*.log'], 'keep.log')).toBe(Verdict.Excluded);
    });

    it('should report a matching negation with nothing to clear as included', () => {
      expect(verdictFor(['!keep.log'], 'keep.log')).toBe(Verdict.Included);
      expect(verdictFor(['!keep.log'], 'other.log')).toBe(Verdict.Undefined);
    });

    it('should give the same verdict for duplicated lines', () => {
      const paths = ['keep.log', 'other.log', 'notes.txt'];

      for (const candidate of paths) {
        expect(verdictFor(['*.log', '*.log', '!keep.log', '!keep.log'], candidate)).toBe(
          verdictFor(['*.log', '!keep.log'], candidate)
        );
      }
    });

    it('should apply directory-only rules to directories only', () => {
      expect(verdictFor(['foo/'], 'foo', true)).toBe(Verdict.Excluded);
      expect(verdictFor(['foo/'], 'foo', false)).toBe(Verdict.Undefined);
    });

    it('should leave an exclusion in place when a directory-only negation meets a file', () => {
      expect(verdictFor(['*.log', '!keep.log/'], 'keep.log', false)).toBe(Verdict.Excluded);
      expect(verdictFor(['*.log', '!keep.log/'], 'keep.log', true)).toBe(Verdict.Included);
    });

    it('should only match anchored rules at the rule set root', () => {
      expect(verdictFor(['/out'], 'out', true)).toBe(Verdict.Excluded);
      expect(verdictFor(['/out'], 'nested/out', true)).toBe(Verdict.Undefined);
    });

    it('should match unanchored rules at any depth', () => {
      expect(verdictFor(['out'], 'out', true)).toBe(Verdict.Excluded);
      expect(verdictFor(['out'], 'nested/out', true)).toBe(Verdict.Excluded);
    });

    it('should exclude everything under a double-star directory and re-include it on negation', () => {
      const paths: Array<[string, boolean]> = [
        ['foo/a.txt', false],
        ['foo/bar', true],
        ['foo/bar/baz.txt', false],
      ];

      for (const [candidate, isDirectory] of paths) {
        expect(verdictFor(['foo/**'], candidate, isDirectory)).toBe(Verdict.Excluded);
        expect(verdictFor(['foo/**', '!foo/**'], candidate, isDirectory)).toBe(Verdict.Included);
      }
      expect(verdictFor(['foo/**'], 'other/a.txt')).toBe(Verdict.Undefined);
    });

    it('should leave the directory under a trailing double star alone', () => {
      expect(verdictFor(['foo/**'], 'foo', true)).toBe(Verdict.Undefined);
      expect(verdictFor(['foo/**'], 'foo', false)).toBe(Verdict.Undefined);
      expect(verdictFor(['/foo/**'], 'foo', true)).toBe(Verdict.Undefined);
      expect(verdictFor(['foo/**'], 'foo/a.txt', false)).toBe(Verdict.Excluded);
    });

    it('should accept absolute paths as well as paths relative to the root', () => {
      expect(verdictFor(['/build'], '/repo/build', true)).toBe(Verdict.Excluded);
      expect(verdictFor(['/build'], 'build', true)).toBe(Verdict.Excluded);
      expect(verdictFor(['/build'], '/elsewhere/build', true)).toBe(Verdict.Undefined);
    });
  });

  describe('isPathIgnored', () => {
    it('should be true only for excluded paths', () => {
      const ruleSet = createRuleSet(ROOT, ['*.log', '!keep.log']);

      expect(isPathIgnored(ruleSet, 'debug.log', false)).toBe(true);
      expect(isPathIgnored(ruleSet, 'keep.log', false)).toBe(false);
      expect(isPathIgnored(ruleSet, 'notes.txt', false)).toBe(false);
    });
  });

  describe('loadRuleSet', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rule-set-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read rules from a file and scope them to its directory', () => {
      const ignoreFile = path.join(tempDir, '.gitignore');
      fs.writeFileSync(ignoreFile, '# comment\r\n/out\r\n*.tmp\r\n');

      const ruleSet = loadRuleSet(ignoreFile);

      expect(ruleSet.root).toBe(tempDir);
      expect(ruleSet.source).toBe(ignoreFile);
      expect(ruleSet.rules.map(rule => rule.source)).toEqual(['/out', '*.tmp']);
      expect(isPathIgnored(ruleSet, 'out', true)).toBe(true);
      expect(isPathIgnored(ruleSet, path.join(tempDir, 'nested', 'out'), true)).toBe(false);
    });

    it('should allow the root to be overridden', () => {
      const ignoreFile = path.join(tempDir, 'rules.txt');
      fs.writeFileSync(ignoreFile, '/out\n');

      const ruleSet = loadRuleSet(ignoreFile, { root: path.join(tempDir, 'project') });

      expect(ruleSet.root).toBe(path.join(tempDir, 'project'));
      expect(isPathIgnored(ruleSet, 'out', true)).toBe(true);
      expect(isPathIgnored(ruleSet, path.join(tempDir, 'out'), true)).toBe(false);
    });

    it('should throw an IoError for a missing file', () => {
      const missing = path.join(tempDir, 'missing', '.gitignore');

      expect(() => loadRuleSet(missing)).toThrow(IoError);
      try {
        loadRuleSet(missing);
      } catch (error) {
        expect(error).toBeInstanceOf(IoError);
        if (error instanceof IoError) {
          expect(error.path).toBe(missing);
          expect(error.code).toBe('IO_ERROR');
        }
      }
    });
  });
});
