/**
 * FILE PURPOSE: Merge stage: per-chunk turns in, turns document out
 * WHY: The orchestrator calls this once every chunk's analysis has completed.
 *      Contract violations (missing chunk results) propagate; schema problems in
 *      the merged turns are reported and do not block the pipeline.
 */

import type { Turn, TurnsDocument } from '@turnkit/shared-types';
import type { ChunkTurns } from '../types.js';
import type { MergeMetadata, MergeOptions } from './merge.js';
import { mergeChunkTurns } from './merge.js';
import { validateTurns } from '../turns/validate.js';

export interface AssembleOptions extends MergeOptions {
  now?: () => Date;
}

export function assembleTurnsDocument(
  meetingId: string,
  results: readonly ChunkTurns<Turn>[],
  metadata: MergeMetadata,
  options: AssembleOptions = {},
): TurnsDocument {
  const { now = () => new Date(), ...mergeOptions } = options;
  const { turns, chunkStats } = mergeChunkTurns(results, metadata, mergeOptions);

  for (const stats of chunkStats) {
    process.stderr.write(
      `INFO: Chunk ${stats.chunkIndex}: added ${stats.added} turns, merged ${stats.merged} duplicates\n`,
    );
  }
  process.stderr.write(`INFO: Meeting ${meetingId}: ${turns.length} turns from ${chunkStats.length} chunks\n`);

  const errors = validateTurns(turns);
  if (errors.length > 0) {
    process.stderr.write(`WARN: Merged turns failed validation (${errors.length} problems): ${errors.slice(0, 5).join('; ')}\n`);
  }

  return {
    meeting_id: meetingId,
    turns: [...turns],
    metadata: {
      total_turns: turns.length,
      chunk_count: chunkStats.length,
      merged_at: now().toISOString(),
    },
  };
}
