import type { BoundaryPreference, Chunk, ChunkingOptions, SourceDocument } from '@groundwork/shared';
import { ConfigError } from '../utils/errors';

/**
 * Chunker
 *
 * Splits a source document into grounding units of at most `size`
 * characters. Adjacent chunks share exactly `overlap` characters, so
 * dropping each chunk's leading `overlap` characters and concatenating
 * reconstructs the document.
 *
 * With a boundary preference the chunk end moves back to the last
 * paragraph or sentence break in the window, but never before
 * `start + max(overlap + 1, size / 2)`: every chunk advances and no
 * chunk shrinks to a sliver.
 */

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_END = /[.!?]["'”’)\]]*\s+/g;
const WHITESPACE = /\s+/g;

export function assertChunkingOptions(options: ChunkingOptions): void {
  const { size, overlap } = options;
  if (!Number.isInteger(size) || size <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= size) {
    throw new ConfigError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size})`);
  }
}

/**
 * Lazily chunk a document. The returned iterable restarts from the first
 * chunk every time it is iterated.
 *
 * @throws ConfigError when the sizing is invalid (checked eagerly)
 */
export function chunkDocument(document: SourceDocument, options: ChunkingOptions): Iterable<Chunk> {
  assertChunkingOptions(options);
  return {
    [Symbol.iterator]: () => generateChunks(document, options),
  };
}

function* generateChunks(document: SourceDocument, options: ChunkingOptions): Generator<Chunk> {
  const { text } = document;
  const { size, overlap, boundary } = options;

  let start = 0;
  let index = 0;
  let previousEnd = 0;

  while (true) {
    const hardEnd = Math.min(start + size, text.length);
    let end =
      hardEnd === text.length
        ? hardEnd
        : findBoundary(text, start, start + Math.max(overlap + 1, Math.floor(size / 2)), hardEnd, boundary);

    // Never cut a surrogate pair; step back unless that would stall the window
    if (splitsPair(text, end)) {
      end = end - 1 - overlap > start ? end - 1 : end + 1;
    }

    yield {
      sourceId: document.id,
      index,
      start,
      end,
      text: text.slice(start, end),
      overlap: index === 0 ? 0 : previousEnd - start,
    };

    if (end >= text.length) {
      return;
    }
    previousEnd = end;
    start = end - overlap;
    if (splitsPair(text, start)) {
      start++;
    }
    index++;
  }
}

function splitsPair(text: string, at: number): boolean {
  if (at <= 0 || at >= text.length) {
    return false;
  }
  const before = text.charCodeAt(at - 1);
  const after = text.charCodeAt(at);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Last preferred break position in (min, max]. Falls back to `max`.
 * Only the current window is scanned.
 */
function findBoundary(
  text: string,
  start: number,
  min: number,
  max: number,
  boundary: BoundaryPreference
): number {
  if (boundary === 'none' || min >= max) {
    return max;
  }

  const patterns = boundary === 'paragraph'
    ? [PARAGRAPH_BREAK, SENTENCE_END, WHITESPACE]
    : [SENTENCE_END, WHITESPACE];

  const window = text.slice(start, max);
  for (const pattern of patterns) {
    const position = lastBreak(window, pattern, min - start);
    if (position !== null) {
      return start + position;
    }
  }
  return max;
}

function lastBreak(window: string, pattern: RegExp, min: number): number | null {
  let best: number | null = null;
  for (const match of window.matchAll(pattern)) {
    const position = (match.index ?? 0) + match[0].length;
    if (position > min) {
      best = position;
    }
  }
  return best;
}
