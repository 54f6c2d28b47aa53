/**
 * FILE PURPOSE: OpenAI-compatible client for the per-chunk analysis calls
 *
 * WHY: Calls go through an LLM proxy (LiteLLM or similar) so the model behind
 *      `TURNS_MODEL` can be swapped without touching this package.
 *
 * USAGE:
 *   const llm = createLLMClient();
 *   const res = await llm.chat.completions.create({ model: 'claude-sonnet', ... });
 */
import OpenAI from 'openai';

export interface LLMClientOptions {
  apiKey?: string;
  baseURL?: string;
  /** SDK-level retries for 429 / 5xx. The orchestrator may retry the whole chunk on top. */
  maxRetries?: number;
  /** Long chunks take minutes to analyse. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

export function createLLMClient(options: LLMClientOptions = {}): OpenAI {
  const baseURL = options.baseURL || process.env.LLM_PROXY_URL || 'http://localhost:4000/v1';
  const apiKey = options.apiKey || process.env.LLM_API_KEY || '';
  const envRetries = parseInt(process.env.LLM_MAX_RETRIES ?? '', 10);
  const maxRetries = options.maxRetries ?? (Number.isFinite(envRetries) && envRetries >= 0 ? envRetries : 3);

  return new OpenAI({
    baseURL,
    apiKey,
    maxRetries,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  });
}

export type { OpenAI };
