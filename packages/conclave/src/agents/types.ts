import { z } from 'zod';
import { EDIT_KINDS } from '../manifest/types.js';

export interface SpecialistDescriptor {
  readonly id: string;
  readonly name: string;
  readonly model: string;
  /** Path patterns this specialist may edit, e.g. `optional-dependencies.*`. */
  readonly allowedPaths: readonly string[];
  /** Instruction template with `{{manifest}}` and `{{allowed_paths}}` placeholders. */
  readonly instructions: string;
  readonly source: 'project' | 'builtin';
}

export interface CompletionRequest {
  /** Log tag, e.g. `configuration` or `judge:configuration`. */
  readonly label: string;
  readonly model: string;
  readonly systemPrompt: string;
  readonly prompt: string;
}

/**
 * The single capability the engine needs from a model provider.
 * Implementations reject with ProviderError for retryable failures and
 * should stop work when `signal` aborts.
 */
export interface ModelBackend {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}

export const ProposedActionSchema = z.object({
  kind: z.enum(EDIT_KINDS),
  path: z.string().min(1),
  value: z.string().min(1),
});

export type ProposedAction = z.infer<typeof ProposedActionSchema>;

export const ProposalPayloadSchema = z.object({
  rationale: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  actions: z.array(ProposedActionSchema),
});

export type ProposalPayload = z.infer<typeof ProposalPayloadSchema>;

const points = z.number().int();

export const JudgeVerdictSchema = z.object({
  scores: z.object({
    correctness: points,
    completeness: points,
    safety: points,
    best_practices: points,
    clarity: points,
  }),
  total: points.optional(),
  notes: z.string().optional(),
});

export type JudgeVerdict = z.infer<typeof JudgeVerdictSchema>;

export interface Proposal {
  readonly specialistId: string;
  readonly specialistName: string;
  readonly rationale: string;
  readonly confidence: number;
  readonly actions: readonly ProposedAction[];
  /** Which extraction tier produced the payload (1 = comment block). */
  readonly extractionTier: 1 | 2 | 3;
}
