/**
 * FILE PURPOSE: Barrel export for the transcript pipeline
 *
 * Import: `import { planTranscriptChunks, mergeChunkTurns } from '@turnkit/transcript-pipeline'`
 */

export type { Chunk, ChunkingParams, ChunkSummary, ChunkMetadataRecord, ChunkTurns } from './types.js';

export { loadPipelineConfig, DEFAULT_CONFIG } from './config.js';
export type { PipelineConfig, TokenEstimatorKind } from './config.js';

// ─── Token estimation ───────────────────────────────────────────────────────
export {
  HeuristicTokenEstimator,
  TiktokenEstimator,
  createTokenEstimator,
  FALLBACK_CHARS_PER_TOKEN,
  ROUGH_CHARS_PER_TOKEN,
} from './tokens/estimator.js';
export type { TokenEstimator } from './tokens/estimator.js';

// ─── Chunking ───────────────────────────────────────────────────────────────
export {
  findNaturalBreak,
  createOverlappingChunks,
  resolveChunkingParams,
  planTranscriptChunks,
  buildChunkMetadata,
  DEFAULT_CHUNKING_PARAMS,
  DEFAULT_CHUNKING_THRESHOLD_TOKENS,
  DEFAULT_SEARCH_RADIUS_CHARS,
} from './chunking/index.js';
export type { ChunkPlan, ChunkPlanOptions } from './chunking/index.js';

// ─── Merging ────────────────────────────────────────────────────────────────
export {
  textSimilarity,
  findDuplicateTurn,
  normalizeSpeaker,
  normalizeText,
  mergeChunkTurns,
  mergeTurnData,
  mergeWindowSize,
  assembleTurnsDocument,
  MissingChunkResultError,
  UnexpectedChunkResultError,
  TURN_DUPLICATE_THRESHOLD,
  CROSS_CHUNK_DUPLICATE_THRESHOLD,
} from './merging/index.js';
export type {
  ComparableTurn,
  MergeableTurn,
  MergeMetadata,
  MergeOptions,
  MergeWindowOptions,
  MergeOutcome,
  ChunkMergeStats,
  AssembleOptions,
} from './merging/index.js';

// ─── Segmenting ─────────────────────────────────────────────────────────────
export {
  createSegmentsFromTurns,
  segmentRawTranscript,
  parseTimestampSeconds,
  DEFAULT_SEGMENT_MAX_TOKENS,
} from './segmenting/index.js';
export type { SegmentableTurn, SegmentOptions } from './segmenting/index.js';

// ─── Turns from the analysis model ──────────────────────────────────────────
export { normalizeTurns, normalizeTurnType, normalizeLikelihood, validateTurns } from './turns/index.js';
export { extractChunkTurns, TURNS_SYSTEM_PROMPT } from './extraction/chunk-turns.js';
export type { ExtractTurnsOptions } from './extraction/chunk-turns.js';
export { extractJson, JsonExtractionError } from './json-extractor.js';
export type { ExtractionResult } from './json-extractor.js';
export { createLLMClient } from './llm-client.js';
export type { LLMClientOptions, OpenAI } from './llm-client.js';

export { createPipelineStages } from './stages.js';
export type { PipelineStages } from './stages.js';
