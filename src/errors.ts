/**
 * Error types raised while loading ignore files and compiling their rules
 */

/**
 * Base error class for the ignore engine
 */
export class IgnoreEngineError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IgnoreEngineError';
    this.code = code;
  }
}

/**
 * An ignore file or directory could not be read
 */
export class IoError extends IgnoreEngineError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not read ${path}: ${describeCause(cause)}`, 'IO_ERROR', { cause });
    this.name = 'IoError';
    this.path = path;
  }
}

/**
 * A single ignore rule has invalid glob syntax
 */
export class PatternCompileError extends IgnoreEngineError {
  /** The rule text exactly as it appeared in the ignore file */
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid ignore pattern "${pattern}": ${reason}`, 'PATTERN_COMPILE_ERROR');
    this.name = 'PatternCompileError';
    this.pattern = pattern;
    this.reason = reason;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : 'Unknown error';
}
