/**
 * FILE PURPOSE: Decide whether a transcript needs chunking, chunk it, and build the audit record
 * WHY: Small transcripts skip chunking entirely (one analysis call, nothing to merge).
 *      The estimator runs once over the whole transcript; per-chunk counts use the
 *      character ratio.
 */

import type { Chunk, ChunkingParams, ChunkMetadataRecord } from '../types.js';
import type { TokenEstimator } from '../tokens/estimator.js';
import { HeuristicTokenEstimator, ROUGH_CHARS_PER_TOKEN } from '../tokens/estimator.js';
import { createOverlappingChunks, resolveChunkingParams } from './overlapping.js';

export const DEFAULT_CHUNKING_THRESHOLD_TOKENS = 50000;

export interface ChunkPlanOptions extends Partial<ChunkingParams> {
  /** Chunk only when the pre-check estimate is above this. */
  chunkingThresholdTokens?: number;
  /** Pre-check estimator; defaults to the rough 3 chars/token heuristic. */
  estimator?: TokenEstimator;
  /** Injected for deterministic audit records in tests. */
  now?: () => Date;
}

export interface ChunkPlan {
  chunked: boolean;
  estimatedTotalTokens: number;
  chunks: Chunk[];
  metadata: ChunkMetadataRecord;
}

export function buildChunkMetadata(
  text: string,
  chunks: readonly Chunk[],
  params: ChunkingParams,
  estimatedTotalTokens: number,
  createdAt: Date = new Date(),
): ChunkMetadataRecord {
  return {
    chunkCount: chunks.length,
    totalChars: text.length,
    estimatedTotalTokens,
    params: { ...params },
    chunks: chunks.map((chunk) => ({
      index: chunk.index,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      overlapStartOffset: chunk.overlapStartOffset,
      estimatedTokens: chunk.estimatedTokens,
      hasNext: chunk.hasNext,
    })),
    createdAt: createdAt.toISOString(),
  };
}

/** Whole transcript as chunk 0, used when no chunking is needed. */
function wholeTextChunk(text: string, charsPerToken: number): Chunk {
  return {
    index: 0,
    text,
    startOffset: 0,
    endOffset: text.length,
    overlapStartOffset: text.length,
    overlapText: '',
    estimatedTokens: Math.floor(text.length / charsPerToken),
    hasNext: false,
  };
}

export function planTranscriptChunks(text: string, options: ChunkPlanOptions = {}): ChunkPlan {
  const {
    chunkingThresholdTokens = DEFAULT_CHUNKING_THRESHOLD_TOKENS,
    estimator = new HeuristicTokenEstimator(ROUGH_CHARS_PER_TOKEN),
    now = () => new Date(),
    ...chunkOptions
  } = options;
  const params = resolveChunkingParams(chunkOptions);

  const estimatedTotalTokens = estimator.estimate(text);
  const chunked = estimatedTotalTokens > chunkingThresholdTokens;

  process.stderr.write(
    `INFO: Transcript ${text.length} chars, est. ${estimatedTotalTokens} tokens (${estimator.name}); chunking ${chunked ? 'needed' : 'not needed'}\n`,
  );

  let chunks: Chunk[];
  if (!chunked) {
    chunks = text.length > 0 ? [wholeTextChunk(text, params.charsPerToken)] : [];
  } else {
    chunks = createOverlappingChunks(text, params);
    for (const chunk of chunks) {
      process.stderr.write(
        `INFO: Chunk ${chunk.index}: chars ${chunk.startOffset}-${chunk.endOffset} (${chunk.text.length} chars, overlap ${chunk.overlapText.length})\n`,
      );
    }
  }

  return {
    chunked,
    estimatedTotalTokens,
    chunks,
    metadata: buildChunkMetadata(text, chunks, params, estimatedTotalTokens, now()),
  };
}
