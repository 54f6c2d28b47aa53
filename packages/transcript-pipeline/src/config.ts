/**
 * FILE PURPOSE: Environment-driven pipeline configuration
 *
 * WHY: Orchestrator deployments tune budgets per model without a code change.
 *      Unset or unparseable values fall back to the defaults below.
 */

export type TokenEstimatorKind = 'tiktoken' | 'heuristic';

export interface PipelineConfig {
  chunkSizeTokens: number;
  overlapTokens: number;
  /** Above this (pre-check estimate) a transcript is chunked at all. */
  chunkingThresholdTokens: number;
  searchRadiusChars: number;
  mergeSimilarityThreshold: number;
  /** Upper bound on how many trailing merged turns a new turn is compared against. */
  mergeWindowMaxTurns: number;
  /** Used to turn the overlap size in characters into a turn count. */
  mergeAverageTurnChars: number;
  segmentMaxTokens: number;
  tokenEstimator: TokenEstimatorKind;
  turnsModel: string;
}

export const DEFAULT_CONFIG: Readonly<PipelineConfig> = {
  chunkSizeTokens: 15000,
  overlapTokens: 2000,
  chunkingThresholdTokens: 50000,
  searchRadiusChars: 500,
  mergeSimilarityThreshold: 0.75,
  mergeWindowMaxTurns: 50,
  mergeAverageTurnChars: 200,
  segmentMaxTokens: 3000,
  tokenEstimator: 'tiktoken',
  turnsModel: 'claude-sonnet',
};

type Env = Record<string, string | undefined>;

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readNonNegativeInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function readRatio(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 && parsed <= 1 ? parsed : fallback;
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const estimator = env.TOKEN_ESTIMATOR?.trim().toLowerCase();
  const chunkSizeTokens = readPositiveInt(env.CHUNK_SIZE_TOKENS, DEFAULT_CONFIG.chunkSizeTokens);
  const overlapTokens = readNonNegativeInt(env.CHUNK_OVERLAP_TOKENS, DEFAULT_CONFIG.overlapTokens);

  return {
    chunkSizeTokens,
    // Overlap must stay below the chunk size or the chunker has no stride.
    overlapTokens:
      overlapTokens < chunkSizeTokens
        ? overlapTokens
        : Math.min(DEFAULT_CONFIG.overlapTokens, chunkSizeTokens - 1),
    chunkingThresholdTokens: readPositiveInt(env.CHUNKING_THRESHOLD_TOKENS, DEFAULT_CONFIG.chunkingThresholdTokens),
    searchRadiusChars: readNonNegativeInt(env.CHUNK_SEARCH_RADIUS_CHARS, DEFAULT_CONFIG.searchRadiusChars),
    mergeSimilarityThreshold: readRatio(env.MERGE_SIMILARITY_THRESHOLD, DEFAULT_CONFIG.mergeSimilarityThreshold),
    mergeWindowMaxTurns: readPositiveInt(env.MERGE_WINDOW_MAX_TURNS, DEFAULT_CONFIG.mergeWindowMaxTurns),
    mergeAverageTurnChars: readPositiveInt(env.MERGE_AVERAGE_TURN_CHARS, DEFAULT_CONFIG.mergeAverageTurnChars),
    segmentMaxTokens: readPositiveInt(env.SEGMENT_MAX_TOKENS, DEFAULT_CONFIG.segmentMaxTokens),
    tokenEstimator: estimator === 'heuristic' ? 'heuristic' : DEFAULT_CONFIG.tokenEstimator,
    turnsModel: env.TURNS_MODEL?.trim() || DEFAULT_CONFIG.turnsModel,
  };
}
