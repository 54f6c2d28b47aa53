/**
 * FILE PURPOSE: Configured entry points for the orchestrator
 * WHY: Binds one PipelineConfig and one TokenEstimator (picked at startup) to
 *      the chunk, merge and segment stages so every caller runs with the same
 *      budgets. Chunk planning stays on the rough chars/3 count its threshold and
 *      per-chunk estimates are expressed in; the startup estimator sizes segments.
 */

import type { Segment, Turn, TurnsDocument } from '@turnkit/shared-types';
import type { ChunkTurns } from './types.js';
import type { PipelineConfig } from './config.js';
import type { TokenEstimator } from './tokens/estimator.js';
import type { ChunkPlan } from './chunking/plan.js';
import type { MergeMetadata } from './merging/merge.js';
import type { SegmentableTurn } from './segmenting/segmenter.js';
import { loadPipelineConfig } from './config.js';
import { createTokenEstimator, HeuristicTokenEstimator, ROUGH_CHARS_PER_TOKEN } from './tokens/estimator.js';
import { planTranscriptChunks } from './chunking/plan.js';
import { assembleTurnsDocument } from './merging/document.js';
import { createSegmentsFromTurns } from './segmenting/segmenter.js';

export interface PipelineStages {
  readonly config: PipelineConfig;
  readonly estimator: TokenEstimator;
  planChunks(text: string): ChunkPlan;
  mergeTurns(meetingId: string, results: readonly ChunkTurns<Turn>[], metadata: MergeMetadata): TurnsDocument;
  segmentTurns(turns: readonly SegmentableTurn[]): Segment[];
}

export function createPipelineStages(
  config: PipelineConfig = loadPipelineConfig(),
  estimator: TokenEstimator = createTokenEstimator(config.tokenEstimator),
): PipelineStages {
  return {
    config,
    estimator,
    planChunks: (text) =>
      planTranscriptChunks(text, {
        chunkSizeTokens: config.chunkSizeTokens,
        overlapTokens: config.overlapTokens,
        searchRadiusChars: config.searchRadiusChars,
        chunkingThresholdTokens: config.chunkingThresholdTokens,
        // The threshold is calibrated in rough chars/3 tokens, the unit of every chunk estimate.
        estimator: new HeuristicTokenEstimator(ROUGH_CHARS_PER_TOKEN),
      }),
    mergeTurns: (meetingId, results, metadata) =>
      assembleTurnsDocument(meetingId, results, metadata, {
        similarityThreshold: config.mergeSimilarityThreshold,
        maxTurns: config.mergeWindowMaxTurns,
        averageTurnChars: config.mergeAverageTurnChars,
      }),
    segmentTurns: (turns) =>
      createSegmentsFromTurns(turns, {
        maxTokensPerSegment: config.segmentMaxTokens,
        estimator,
      }),
  };
}
