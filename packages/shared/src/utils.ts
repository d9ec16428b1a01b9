import { createHash } from 'crypto';

/**
 * Shared utility functions for Groundwork.
 */

/**
 * Generate a unique run ID for tracing.
 */
export function generateRunId(): string {
  return `run_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Collapse every whitespace run to a single space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Stable normalization for turn content:
 * trailing spaces are stripped from every line, runs of blank lines
 * become a single blank line, and the whole block is trimmed.
 */
export function normalizeContent(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n').map((line) => line.trimEnd());
  const kept: string[] = [];
  for (const line of lines) {
    if (line === '' && kept.length > 0 && kept[kept.length - 1] === '') {
      continue;
    }
    kept.push(line);
  }
  return kept.join('\n').trim();
}

/**
 * SHA-256 hex digest of a string.
 */
export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
