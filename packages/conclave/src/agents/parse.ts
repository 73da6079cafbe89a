import type { z } from 'zod';
import * as fmt from '../output/format.js';
import { UnparseableOutputError } from '../errors.js';
import { ProposalPayloadSchema, JudgeVerdictSchema } from './types.js';
import type { ProposalPayload, JudgeVerdict } from './types.js';

/**
 * 3-tier extraction of the JSON payload a model appends to its prose.
 *
 * Models are unreliable at JSON formatting under reasoning load. Each tier is
 * tried in order and the first candidate that passes the schema wins.
 */

export type ExtractionTier = 1 | 2 | 3;

export interface Extracted<T> {
  data: T;
  tier: ExtractionTier;
  /** The response text with the winning payload removed. */
  prose: string;
}

/**
 * Tier 1: the last `<!-- conclave-json ... -->` block.
 */
export function extractConclaveJsonBlock(markdown: string): string | null {
  const matches = [...markdown.matchAll(/<!--\s*conclave-json\s*\n?([\s\S]*?)-->/g)];
  const last = matches[matches.length - 1];
  return last ? last[1].trim() : null;
}

/**
 * Tier 2: the last fenced ```json block.
 */
export function extractFencedJson(markdown: string): string | null {
  const matches = [...markdown.matchAll(/```json[^\S\n]*\n([\s\S]*?)```/g)];
  const last = matches[matches.length - 1];
  return last ? last[1].trim() : null;
}

/**
 * Tier 3: the last balanced top-level `{...}` in the text.
 */
export function extractBareJsonObject(text: string): string | null {
  let depth = 0;
  let start = -1;
  let inString = false;
  let found: string | null = null;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) found = text.slice(start, i + 1);
    }
  }
  return found;
}

/**
 * Try to parse a JSON string, returning null on failure.
 */
export function tryParseJson(jsonStr: string): unknown {
  try {
    return JSON.parse(jsonStr);
  } catch {
    return null;
  }
}

const TIERS: readonly { tier: ExtractionTier; extract: (text: string) => string | null }[] = [
  { tier: 1, extract: extractConclaveJsonBlock },
  { tier: 2, extract: extractFencedJson },
  { tier: 3, extract: extractBareJsonObject },
];

function removeCandidate(text: string, tier: ExtractionTier, candidate: string): string {
  if (tier === 1) return text.replace(/<!--\s*conclave-json[\s\S]*?-->/g, '').trim();
  if (tier === 2) return text.replace(/```json[^\S\n]*\n[\s\S]*?```/g, '').trim();
  const at = text.lastIndexOf(candidate);
  return (text.slice(0, at) + text.slice(at + candidate.length)).trim();
}

/**
 * Run the tiers against `text` and return the first payload that validates.
 * Never fail silently: fallbacks are logged with the caller's label.
 */
export function extractPayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, label: string): Extracted<T> | null {
  for (const { tier, extract } of TIERS) {
    const candidate = extract(text);
    if (candidate === null) continue;
    const parsed = schema.safeParse(tryParseJson(candidate));
    if (!parsed.success) {
      fmt.warn(`[${label}] Tier ${tier} payload did not validate: ${parsed.error.issues[0]?.message ?? 'invalid'}. Falling back.`);
      continue;
    }
    if (tier > 1) fmt.warn(`[${label}] No valid <!-- conclave-json --> block; used tier ${tier} extraction.`);
    return { data: parsed.data, tier, prose: removeCandidate(text, tier, candidate) };
  }
  return null;
}

function excerpt(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > 200 ? `${flat.slice(0, 200)}...` : flat;
}

export function parseProposalPayload(text: string, label: string): Extracted<ProposalPayload> {
  const extracted = extractPayload(ProposalPayloadSchema, text, label);
  if (!extracted) {
    throw new UnparseableOutputError(`[${label}] response has no valid proposal payload`, excerpt(text));
  }
  return extracted;
}

export function parseJudgeVerdict(text: string, label: string): Extracted<JudgeVerdict> {
  const extracted = extractPayload(JudgeVerdictSchema, text, label);
  if (!extracted) {
    throw new UnparseableOutputError(`[${label}] response has no valid score payload`, excerpt(text));
  }
  return extracted;
}
