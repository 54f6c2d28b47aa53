/**
 * FILE PURPOSE: Token estimation strategies
 *
 * WHY: Budgets are expressed in tokens but the chunker works in characters.
 *      A precise tokenizer and a character heuristic sit behind one interface and
 *      the choice is made once, at startup, so callers never catch a tokenizer
 *      failure per call.
 */

import { getEncoding } from 'js-tiktoken';
import type { Tiktoken } from 'js-tiktoken';
import type { TokenEstimatorKind } from '../config.js';

export interface TokenEstimator {
  readonly name: string;
  estimate(text: string): number;
}

/** Default fallback ratio, ~4 characters per token for English prose. */
export const FALLBACK_CHARS_PER_TOKEN = 4;

/** Conservative ratio for the "does this need chunking at all?" pre-check and for chunk budgets. */
export const ROUGH_CHARS_PER_TOKEN = 3;

export class HeuristicTokenEstimator implements TokenEstimator {
  readonly name: string;

  constructor(private readonly charsPerToken = FALLBACK_CHARS_PER_TOKEN) {
    this.name = `heuristic-${charsPerToken}`;
  }

  estimate(text: string): number {
    if (!text) return 0;
    return Math.max(1, Math.floor(text.length / this.charsPerToken));
  }
}

/** cl100k_base token counts via js-tiktoken. Close enough for Claude-family budgets. */
export class TiktokenEstimator implements TokenEstimator {
  readonly name = 'tiktoken-cl100k_base';
  private readonly encoding: Tiktoken;

  constructor() {
    this.encoding = getEncoding('cl100k_base');
  }

  estimate(text: string): number {
    if (!text) return 0;
    return this.encoding.encode(text).length;
  }
}

/**
 * Build the estimator for this process.
 * Falls back to the heuristic when the tokenizer cannot be initialised.
 */
export function createTokenEstimator(kind: TokenEstimatorKind = 'tiktoken'): TokenEstimator {
  if (kind === 'heuristic') {
    return new HeuristicTokenEstimator();
  }

  try {
    return new TiktokenEstimator();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`WARN: tiktoken unavailable (${message}), using ${FALLBACK_CHARS_PER_TOKEN} chars/token heuristic\n`);
    return new HeuristicTokenEstimator();
  }
}
