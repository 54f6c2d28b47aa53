/**
 * FILE PURPOSE: Split a transcript into overlapping chunks under a token budget
 * WHY: The turn extractor has a hard input limit. Overlap keeps a turn that
 *      straddles a boundary whole in at least one chunk; the merger removes the
 *      copy afterwards.
 */

import type { Chunk, ChunkingParams } from '../types.js';
import { ROUGH_CHARS_PER_TOKEN } from '../tokens/estimator.js';
import { DEFAULT_SEARCH_RADIUS_CHARS, findNaturalBreak } from './natural-break.js';

export const DEFAULT_CHUNKING_PARAMS: Readonly<ChunkingParams> = {
  chunkSizeTokens: 15000,
  overlapTokens: 2000,
  charsPerToken: ROUGH_CHARS_PER_TOKEN,
  searchRadiusChars: DEFAULT_SEARCH_RADIUS_CHARS,
};

export function resolveChunkingParams(options?: Partial<ChunkingParams>): ChunkingParams {
  const params: ChunkingParams = { ...DEFAULT_CHUNKING_PARAMS, ...options };

  if (!(params.charsPerToken > 0)) {
    throw new RangeError(`charsPerToken must be positive, got ${params.charsPerToken}`);
  }
  if (!(params.chunkSizeTokens > 0)) {
    throw new RangeError(`chunkSizeTokens must be positive, got ${params.chunkSizeTokens}`);
  }
  if (!(params.overlapTokens >= 0) || params.overlapTokens >= params.chunkSizeTokens) {
    throw new RangeError(
      `overlapTokens must be in [0, chunkSizeTokens), got ${params.overlapTokens} (chunk size ${params.chunkSizeTokens})`,
    );
  }
  if (!(params.searchRadiusChars >= 0)) {
    throw new RangeError(`searchRadiusChars must be non-negative, got ${params.searchRadiusChars}`);
  }
  return params;
}

/**
 * Split `text` into chunks of roughly `chunkSizeTokens`, each sharing about
 * `overlapTokens` with the next, with both ends moved onto natural breaks.
 *
 * Empty text yields no chunks; text within one budget yields a single chunk.
 * @throws RangeError on inconsistent budgets
 */
export function createOverlappingChunks(text: string, options?: Partial<ChunkingParams>): Chunk[] {
  const params = resolveChunkingParams(options);
  const chunkChars = Math.floor(params.chunkSizeTokens * params.charsPerToken);
  const overlapChars = Math.floor(params.overlapTokens * params.charsPerToken);
  if (chunkChars < 1) {
    throw new RangeError(`chunk budget of ${params.chunkSizeTokens} tokens is under one character`);
  }
  const stride = Math.max(1, chunkChars - overlapChars);
  const total = text.length;

  const chunks: Chunk[] = [];
  let cursor = 0;

  while (cursor < total) {
    const start = cursor;
    const targetEnd = Math.min(start + chunkChars, total);

    let end = total;
    if (targetEnd < total) {
      end = findNaturalBreak(text, targetEnd, params.searchRadiusChars);
      // A break behind the cursor would give an empty or inverted chunk.
      if (end <= start) end = targetEnd;
    }

    const hasNext = end < total;
    const overlapStartOffset = hasNext ? Math.max(start, end - overlapChars) : end;
    const chunkText = text.slice(start, end);

    chunks.push({
      index: chunks.length,
      text: chunkText,
      startOffset: start,
      endOffset: end,
      overlapStartOffset,
      overlapText: hasNext ? text.slice(overlapStartOffset, end) : '',
      estimatedTokens: Math.floor(chunkText.length / params.charsPerToken),
      hasNext,
    });

    if (!hasNext) break;

    const nextTarget = start + stride;
    let next = nextTarget < total ? findNaturalBreak(text, nextTarget, params.searchRadiusChars) : total;
    // Never skip past this chunk's end (text would be lost) and always move forward.
    if (next > end) next = end;
    if (next <= start) next = Math.min(nextTarget, end);
    cursor = next;
  }

  return chunks;
}
