import { readFileSync } from 'node:fs';
import { IoError } from '../errors.js';

/**
 * Split ignore-file text into raw lines, accepting LF and CRLF endings
 */
export function splitIgnoreText(text: string): string[] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  return content.split(/\r?\n/);
}

/**
 * Read the raw lines of an ignore file
 * @throws IoError if the file cannot be read
 */
export function readIgnoreLines(filePath: string): string[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IoError(filePath, error);
  }
  return splitIgnoreText(content);
}

/**
 * Whether a raw line carries a rule, as opposed to being blank or a comment
 */
export function isRuleLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}
