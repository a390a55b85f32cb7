import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { includedPaths, includedPathsForRuleSet, walkIncludedPaths } from '../tree-walker.js';
import { createHierarchy } from '../../hierarchy/hierarchy-resolver.js';
import { loadRuleSet } from '../../rule-sets/rule-set.js';
import { IoError } from '../../errors.js';

function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

describe('tree-walker', () => {
  let tempDir: string;
  const at = (...segments: string[]) => path.join(tempDir, ...segments);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tree-walker-'));
    writeTree(tempDir, {
      '.gitignore': 'build/\n*.tmp\n!keep.tmp\n',
      '.git/HEAD': '',
      'build/out.js': '',
      'a.tmp': '',
      'keep.tmp': '',
      'readme.md': '',
      'src/main.ts': '',
      'sub/.gitignore': 'readme.md\n',
      'sub/readme.md': '',
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('includedPaths', () => {
    it('should list every path the hierarchy does not exclude', () => {
      expect(includedPaths(createHierarchy(tempDir))).toEqual([
        at('.gitignore'),
        at('keep.tmp'),
        at('readme.md'),
        at('src'),
        at('src', 'main.ts'),
        at('sub'),
        at('sub', '.gitignore'),
      ]);
    });

    it('should report symbolic links to directories without following them', () => {
      fs.symlinkSync(at('src'), at('linked'));

      const result = includedPaths(createHierarchy(tempDir));

      expect(result).toContain(at('linked'));
      expect(result).not.toContain(at('linked', 'main.ts'));
    });
  });

  describe('includedPathsForRuleSet', () => {
    it('should only apply the rules of one file', () => {
      expect(includedPathsForRuleSet(loadRuleSet(at('.gitignore')))).toEqual([
        at('.gitignore'),
        at('keep.tmp'),
        at('readme.md'),
        at('src'),
        at('src', 'main.ts'),
        at('sub'),
        at('sub', '.gitignore'),
        at('sub', 'readme.md'),
      ]);
    });
  });

  describe('walkIncludedPaths', () => {
    it('should not descend into excluded directories', () => {
      const isExcluded = vi.fn((absolutePath: string) => absolutePath.endsWith('/src'));

      const result = walkIncludedPaths(tempDir, isExcluded, { skipNames: ['.git', 'build', 'sub'] });

      expect(result).toEqual([at('.gitignore'), at('a.tmp'), at('keep.tmp'), at('readme.md')]);
      expect(isExcluded).not.toHaveBeenCalledWith(at('src', 'main.ts'), false);
      expect(isExcluded).toHaveBeenCalledWith(at('src'), true);
    });

    it('should report names that are no longer skipped', () => {
      const result = walkIncludedPaths(tempDir, () => false, { skipNames: [] });

      expect(result).toContain(at('.git'));
      expect(result).toContain(at('.git', 'HEAD'));
    });

    it('should report an unreadable root and return nothing', () => {
      const onSkip = vi.fn();

      const result = walkIncludedPaths(at('missing'), () => false, { onSkip });

      expect(result).toEqual([]);
      expect(onSkip).toHaveBeenCalledTimes(1);
      expect(onSkip.mock.calls[0][0]).toBeInstanceOf(IoError);
    });
  });
});
