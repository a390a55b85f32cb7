import type { IoError } from '../errors.js';

/**
 * Decides whether an entry found during traversal is excluded
 * @param absolutePath Absolute path of the entry
 * @param isDirectory Whether the entry is a directory
 */
export type ExclusionCheck = (absolutePath: string, isDirectory: boolean) => boolean;

/**
 * Options for walking a directory tree
 */
export interface WalkOptions {
  /** Entry names never reported or descended into (defaults to .git) */
  skipNames?: string[];
  /** Called for every directory that could not be read */
  onSkip?: (error: IoError) => void;
}
