/**
 * FILE PURPOSE: Merge per-chunk turn lists into one ordered, duplicate-free sequence
 * WHY: Each chunk is analysed independently, so turns from an overlap region come
 *      back twice with chunk-local indices. Chunks are merged strictly in index
 *      order: a turn of chunk i+1 can only duplicate the tail of what chunk i
 *      contributed, so only a bounded trailing window is searched.
 */

import type { ChunkingParams, ChunkTurns } from '../types.js';
import type { ComparableTurn } from './similarity.js';
import { findDuplicateTurn, normalizeText } from './similarity.js';
import { MissingChunkResultError, UnexpectedChunkResultError } from './errors.js';

/** Similarity needed to fold a cross-chunk turn into an earlier one. */
export const CROSS_CHUNK_DUPLICATE_THRESHOLD = 0.75;

export interface MergeableTurn extends ComparableTurn {
  idx?: number;
  start_ts?: string | null;
  end_ts?: string | null;
  timestamp?: string | null;
}

const TIMESTAMP_FIELDS = ['start_ts', 'end_ts', 'timestamp'] as const;
type TimestampField = (typeof TIMESTAMP_FIELDS)[number];

/** What the merger needs from the chunk metadata record. */
export interface MergeMetadata {
  chunks: ReadonlyArray<{ index: number }>;
  params: Pick<ChunkingParams, 'overlapTokens' | 'charsPerToken'>;
}

export interface MergeWindowOptions {
  /** Fixed window; skips the overlap-based estimate. */
  windowTurns?: number;
  /** Cap on the estimated window. Default 50. */
  maxTurns?: number;
  /** Typical turn length used to convert overlap characters to turns. Default 200. */
  averageTurnChars?: number;
}

export interface MergeOptions extends MergeWindowOptions {
  similarityThreshold?: number;
}

export interface ChunkMergeStats {
  chunkIndex: number;
  added: number;
  merged: number;
}

export interface MergeOutcome<T> {
  turns: readonly T[];
  chunkStats: ChunkMergeStats[];
}

/**
 * How many trailing merged turns a new turn is compared against.
 * Heuristic: overlap characters / average turn length, capped, at least 1.
 */
export function mergeWindowSize(overlapChars: number, options: MergeWindowOptions = {}): number {
  if (options.windowTurns !== undefined) {
    return Math.max(1, Math.floor(options.windowTurns));
  }
  const maxTurns = options.maxTurns ?? 50;
  const averageTurnChars = options.averageTurnChars ?? 200;
  const estimate = Math.ceil(Math.max(0, overlapChars) / Math.max(1, averageTurnChars));
  return Math.max(1, Math.min(maxTurns, estimate));
}

/**
 * Combine two copies of the same turn. The copy with more normalised text wins
 * (ties keep `existing`); for each timestamp both copies carry, the
 * lexicographically earlier one is kept.
 */
export function mergeTurnData<T extends MergeableTurn>(existing: T, incoming: T): T {
  const base = normalizeText(incoming.text).length > normalizeText(existing.text).length ? incoming : existing;

  const timestamps: Partial<Record<TimestampField, string>> = {};
  for (const field of TIMESTAMP_FIELDS) {
    const a = existing[field];
    const b = incoming[field];
    if (typeof a === 'string' && a && typeof b === 'string' && b) {
      timestamps[field] = a <= b ? a : b;
    }
  }

  return { ...base, ...timestamps };
}

/** Order results by chunk index and check them against the metadata. */
function collectResults<T>(
  results: readonly ChunkTurns<T>[],
  metadata: MergeMetadata,
): ChunkTurns<T>[] {
  const expected = new Set(metadata.chunks.map((chunk) => chunk.index));
  const byIndex = new Map<number, ChunkTurns<T>>();

  for (const result of results) {
    if (!expected.has(result.chunkIndex)) {
      throw new UnexpectedChunkResultError(result.chunkIndex, 'unknown');
    }
    if (byIndex.has(result.chunkIndex)) {
      throw new UnexpectedChunkResultError(result.chunkIndex, 'duplicate');
    }
    byIndex.set(result.chunkIndex, result);
  }

  const ordered = [...expected].sort((a, b) => a - b);
  return ordered.map((index) => {
    const result = byIndex.get(index);
    if (!result) {
      throw new MissingChunkResultError(index, ordered.length);
    }
    return result;
  });
}

/**
 * Merge per-chunk turn lists, accepted in any completion order, into one list
 * re-indexed 0..N-1.
 *
 * @throws MissingChunkResultError when a chunk in `metadata` has no result
 * @throws UnexpectedChunkResultError on a duplicate or unknown chunk index
 */
export function mergeChunkTurns<T extends MergeableTurn>(
  results: readonly ChunkTurns<T>[],
  metadata: MergeMetadata,
  options: MergeOptions = {},
): MergeOutcome<T> {
  const ordered = collectResults(results, metadata);

  if (ordered.length === 0) {
    return { turns: [], chunkStats: [] };
  }

  const [first, ...rest] = ordered;
  if (!first) {
    return { turns: [], chunkStats: [] };
  }
  if (rest.length === 0) {
    return {
      turns: [...first.turns],
      chunkStats: [{ chunkIndex: first.chunkIndex, added: first.turns.length, merged: 0 }],
    };
  }

  const threshold = options.similarityThreshold ?? CROSS_CHUNK_DUPLICATE_THRESHOLD;
  const overlapChars = metadata.params.overlapTokens * metadata.params.charsPerToken;
  const window = mergeWindowSize(overlapChars, options);

  const merged: T[] = [...first.turns];
  const chunkStats: ChunkMergeStats[] = [
    { chunkIndex: first.chunkIndex, added: first.turns.length, merged: 0 },
  ];

  for (const result of rest) {
    const stats: ChunkMergeStats = { chunkIndex: result.chunkIndex, added: 0, merged: 0 };

    for (const turn of result.turns) {
      const searchStart = Math.max(0, merged.length - window);
      const position = findDuplicateTurn(turn, merged.slice(searchStart), threshold);
      const existing = position === null ? undefined : merged[searchStart + position];

      if (position !== null && existing) {
        merged[searchStart + position] = mergeTurnData(existing, turn);
        stats.merged++;
      } else {
        merged.push(turn);
        stats.added++;
      }
    }

    chunkStats.push(stats);
  }

  return {
    turns: merged.map((turn, idx) => ({ ...turn, idx })),
    chunkStats,
  };
}
