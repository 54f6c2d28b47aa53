/**
 * FILE PURPOSE: Pull a JSON value out of a model response and repair it
 *
 * WHY: Turn lists come back wrapped in markdown fences, prefixed with prose,
 *      with trailing commas, or cut off near the output limit. Plain JSON.parse
 *      loses the whole chunk in those cases.
 * HOW: Candidate extraction (fenced block, first balanced object/array, whole
 *      text), then parse with progressive repair: direct, manual fixes,
 *      jsonrepair.
 *
 * DEPENDENCIES: jsonrepair (npm)
 */

import { jsonrepair } from 'jsonrepair';

export interface ExtractionResult {
  data: unknown;
  /** Which strategy produced the value, 1-based. Higher means a messier response. */
  strategy: number;
}

export class JsonExtractionError extends Error {
  constructor(responseText: string) {
    const preview = responseText.substring(0, 200).replace(/\n/g, ' ');
    super(`Unable to find JSON in model response. Preview: "${preview}${responseText.length > 200 ? '...' : ''}"`);
    this.name = 'JsonExtractionError';
  }
}

/**
 * @throws JsonExtractionError when no strategy yields parseable JSON
 */
export function extractJson(text: string): ExtractionResult {
  const strategies = [fromFencedBlock, fromBalancedBrackets, fromFullText];

  for (let i = 0; i < strategies.length; i++) {
    const strategy = strategies[i];
    const candidate = strategy?.(text);
    if (!candidate) continue;

    const data = parseWithRepair(candidate);
    if (data !== undefined) {
      return { data, strategy: i + 1 };
    }
  }

  throw new JsonExtractionError(text);
}

// ─── Strategies ─────────────────────────────────────────────────────────────

/** ```json ... ``` (or an unlabelled fence). The largest block wins. */
function fromFencedBlock(text: string): string | null {
  const blocks = Array.from(text.matchAll(/```(?:json)?\s*([[{][\s\S]*?)\s*```/g));
  let largest: string | null = null;
  for (const match of blocks) {
    const body = match[1];
    if (body && (!largest || body.length > largest.length)) largest = body;
  }
  return largest;
}

/** First `{` or `[` to its matching close, skipping brackets inside strings. */
function fromBalancedBrackets(text: string): string | null {
  const startIndex = text.search(/[[{]/);
  if (startIndex === -1) return null;

  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = startIndex; i < text.length; i++) {
    const char = text[i];

    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (char === '\\') {
      escapeNext = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{' || char === '[') depth++;
    if (char === '}' || char === ']') {
      depth--;
      if (depth === 0) return text.substring(startIndex, i + 1);
    }
  }

  // Unterminated: hand the tail to jsonrepair, which closes open structures.
  return text.substring(startIndex);
}

function fromFullText(text: string): string | null {
  const trimmed = text.trim();
  return /^[[{]/.test(trimmed) ? trimmed : null;
}

// ─── Repair ─────────────────────────────────────────────────────────────────

/** Parsed value, or undefined when even jsonrepair gives up. */
function parseWithRepair(jsonText: string): unknown {
  try {
    return JSON.parse(jsonText);
  } catch {
    // fall through to manual repair
  }

  const repaired = jsonText
    .replace(/,(\s*[}\]])/g, '$1')
    .replace(/\/\*[\s\S]*?\*\//g, '');

  try {
    return JSON.parse(repaired);
  } catch {
    // fall through to jsonrepair
  }

  try {
    return JSON.parse(jsonrepair(repaired));
  } catch {
    return undefined;
  }
}
