/**
 * FILE PURPOSE: Core types for chunking and chunk bookkeeping
 *
 * WHY: Chunks are internal to the pipeline (camelCase); turns and segments live
 *      in @turnkit/shared-types because they leave the process as JSON.
 */

/** A bounded, possibly-overlapping slice of the transcript, analysed on its own. */
export interface Chunk {
  readonly index: number;
  readonly text: string;
  /** Half-open character offsets into the transcript. */
  readonly startOffset: number;
  readonly endOffset: number;
  readonly overlapStartOffset: number;
  /** Trailing part of `text` repeated at the head of the next chunk. */
  readonly overlapText: string;
  readonly estimatedTokens: number;
  readonly hasNext: boolean;
}

/** Budgets the chunker ran with. Stored with the chunks so the merger can size its window. */
export interface ChunkingParams {
  chunkSizeTokens: number;
  overlapTokens: number;
  charsPerToken: number;
  searchRadiusChars: number;
}

/** Per-chunk entry of the audit record: everything but the text. */
export type ChunkSummary = Omit<Chunk, 'text' | 'overlapText'>;

/** Serialized once per run for the orchestrator's audit trail. */
export interface ChunkMetadataRecord {
  chunkCount: number;
  totalChars: number;
  estimatedTotalTokens: number;
  params: ChunkingParams;
  chunks: ChunkSummary[];
  createdAt: string;
}

/** One analysis result, keyed by the chunk it came from. */
export interface ChunkTurns<T> {
  chunkIndex: number;
  turns: readonly T[];
}
