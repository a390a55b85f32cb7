import path from 'node:path';

/**
 * Convert platform separators to `/`, the only separator the glob matchers understand
 */
export function toPosixPath(filePath: string): string {
  return path.sep === '/' ? filePath : filePath.split(path.sep).join('/');
}

/**
 * Absolutize a candidate path against a root directory
 * @param candidate Absolute path, or a path relative to `root`
 * @param root Directory relative paths are resolved from
 * @returns Normalized absolute path with `/` separators and no trailing slash
 */
export function resolveCandidatePath(candidate: string, root: string): string {
  return toPosixPath(path.resolve(root, candidate));
}

/**
 * Normalize a directory used as a rule root or repository root
 */
export function normalizeRoot(root: string): string {
  return toPosixPath(path.resolve(root));
}

/**
 * Whether `candidate` is `root` itself or lies somewhere beneath it.
 * Both arguments must already be normalized.
 */
export function isWithinRoot(candidate: string, root: string): boolean {
  if (candidate === root) {
    return true;
  }
  const prefix = root.endsWith('/') ? root : `${root}/`;
  return candidate.startsWith(prefix);
}
