#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Token statistics and chunk plan for a transcript file
 *
 * WHY: Before running a long meeting through the pipeline, check how big it is,
 *      whether it will be chunked, and where the chunk boundaries land.
 *
 * USAGE: npx tsx scripts/analyze-transcript.ts <transcript.txt>
 * EXIT: 0 = analysed, 1 = missing or unreadable file
 */

import { existsSync, readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { createPipelineStages, ROUGH_CHARS_PER_TOKEN } from '../packages/transcript-pipeline/src/index.js';

/** Input limit of the analysis model the budgets are tuned for. */
const CONTEXT_LIMIT_TOKENS = 200_000;

function main(): number {
  const filePath = process.argv[2];
  if (!filePath || !existsSync(filePath)) {
    process.stderr.write(`ERROR: File not found: ${filePath ?? '(none)'}\n`);
    process.stderr.write('Usage: npx tsx scripts/analyze-transcript.ts <transcript.txt>\n');
    return 1;
  }

  const content = readFileSync(filePath, 'utf-8');
  const stages = createPipelineStages();
  const plan = stages.planChunks(content);
  const tokenCount = plan.estimatedTotalTokens;
  const words = content.split(/\s+/).filter(Boolean).length;
  const lines = content.split('\n').length;

  const out = (line = '') => process.stdout.write(`${line}\n`);
  out('='.repeat(70));
  out(`TRANSCRIPT ANALYSIS: ${basename(filePath)}`);
  out('='.repeat(70));
  out(`  Characters:      ${content.length.toLocaleString()}`);
  out(`  Lines:           ${lines.toLocaleString()}`);
  out(`  Words:           ${words.toLocaleString()}`);
  out(`  Tokens:          ${tokenCount.toLocaleString()} (~${ROUGH_CHARS_PER_TOKEN} chars/token)`);
  if (tokenCount > 0) {
    out(`  Chars/Token:     ${(content.length / tokenCount).toFixed(2)}`);
  }
  out(`  Context used:    ${((tokenCount / CONTEXT_LIMIT_TOKENS) * 100).toFixed(1)}% of ${CONTEXT_LIMIT_TOKENS.toLocaleString()}`);

  out();
  out(`Chunking: ${plan.chunked ? `${plan.chunks.length} chunks` : 'not needed'}`);
  for (const chunk of plan.chunks) {
    out(
      `  Chunk ${chunk.index}: chars ${chunk.startOffset}-${chunk.endOffset}, ` +
      `~${chunk.estimatedTokens.toLocaleString()} tokens, overlap ${chunk.overlapText.length} chars`,
    );
  }
  out('='.repeat(70));
  return 0;
}

process.exitCode = main();
