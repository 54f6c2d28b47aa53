/**
 * FILE PURPOSE: Ask the analysis model for the turns in one chunk
 * WHY: Produces the `{ chunkIndex, turns }` records the merger consumes. Fan-out
 *      across chunks, and retrying a whole chunk, belong to the orchestrator.
 */

import type { Turn } from '@turnkit/shared-types';
import type { Chunk, ChunkTurns } from '../types.js';
import { createLLMClient } from '../llm-client.js';
import { extractJson } from '../json-extractor.js';
import { normalizeTurns } from '../turns/normalize.js';
import { loadPipelineConfig } from '../config.js';

export const TURNS_SYSTEM_PROMPT = `Convert raw meeting transcript text into structured turns.
Return JSON: { "turns": [ ... ] }. Each turn has exactly these fields:
- idx: integer, 0-based position within this text
- start_ts, end_ts: "HH:MM:SS"
- speaker: speaker name as written in the transcript
- type: one of question, answer, followup, monologue, housekeeping
- question_likelihood: number between 0 and 1
- text: what the speaker said

Return ONLY the JSON object.`;

export interface ExtractTurnsOptions {
  meetingId: string;
  model?: string;
  timeZone?: string;
  maxTokens?: number;
}

function buildUserPrompt(chunk: Chunk, options: ExtractTurnsOptions): string {
  const position = chunk.hasNext || chunk.index > 0
    ? `This is part ${chunk.index + 1} of a longer transcript (characters ${chunk.startOffset}-${chunk.endOffset}). ` +
      'Its start and end may repeat text from the neighbouring parts; transcribe every turn you see.\n\n'
    : '';

  return `${position}TRANSCRIPT:
${chunk.text}

MEETING_ID: ${options.meetingId}
TIME_ZONE: ${options.timeZone ?? 'America/New_York'}`;
}

/** Pull the turns array out of `{ turns: [...] }` or a bare array. */
function turnsFromPayload(data: unknown): unknown {
  if (Array.isArray(data)) return data;
  if (typeof data === 'object' && data !== null && 'turns' in data) {
    return data.turns;
  }
  return [];
}

export async function extractChunkTurns(
  chunk: Chunk,
  options: ExtractTurnsOptions,
): Promise<ChunkTurns<Turn>> {
  if (chunk.text.trim().length === 0) {
    return { chunkIndex: chunk.index, turns: [] };
  }

  const model = options.model ?? loadPipelineConfig().turnsModel;
  const client = createLLMClient();

  const response = await client.chat.completions.create({
    model,
    messages: [
      { role: 'system', content: TURNS_SYSTEM_PROMPT },
      { role: 'user', content: buildUserPrompt(chunk, options) },
    ],
    max_tokens: options.maxTokens ?? 32000,
    temperature: 0,
  });

  const raw = response.choices[0]?.message?.content ?? '';
  const { data, strategy } = extractJson(raw);
  if (strategy > 1) {
    process.stderr.write(`WARN: Chunk ${chunk.index} turns JSON needed extraction strategy ${strategy}\n`);
  }

  const turns = normalizeTurns(turnsFromPayload(data));
  process.stderr.write(`INFO: Chunk ${chunk.index}: model returned ${turns.length} turns\n`);
  return { chunkIndex: chunk.index, turns };
}
