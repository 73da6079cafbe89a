import { ManifestDocument } from '../manifest/document.js';
import type { CompletionRequest, ModelBackend, Proposal, ProposedAction, SpecialistDescriptor } from '../agents/types.js';
import type { RetryPolicy } from '../round/retry.js';
import type { RubricPoints } from '../round/rubric.js';
import type { SyncExit, SyncRunner } from '../sync.js';
import type { ConclaveConfig, Task } from '../types.js';

export const BASE_MANIFEST = '[project]\nname = "demo"\nversion = "0.1.0"\ndependencies = ["requests"]\n';

/** Retries without real waiting. */
export const FAST_RETRY: RetryPolicy = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

export function makeConfig(round: Partial<ConclaveConfig['round']> = {}): ConclaveConfig {
  return {
    project: { name: 'demo', manifest: 'pyproject.toml' },
    specialists: ['configuration', 'workflow'],
    models: { specialist: 'sonnet', judge: 'sonnet' },
    round: {
      specialist_timeout_ms: 5_000,
      judge_timeout_ms: 5_000,
      max_retries: 1,
      backoff_base_ms: 1,
      backoff_max_ms: 2,
      ...round,
    },
    sync: { command: null },
    lock: { lease_seconds: 30 },
  };
}

export function makeTask(text: string = BASE_MANIFEST, manifestPath = '/work/pyproject.toml'): Task {
  return {
    request: 'Add pytest for the test suite',
    diagnostics: null,
    manifest: ManifestDocument.parse(manifestPath, text),
  };
}

export function makeDescriptor(id: string, allowedPaths: string[] = ['dependencies', 'optional-dependencies.*']): SpecialistDescriptor {
  return {
    id,
    name: id.charAt(0).toUpperCase() + id.slice(1),
    model: 'sonnet',
    allowedPaths,
    instructions: `You are ${id}. Edit {{manifest}} within {{allowed_paths}}.`,
    source: 'builtin',
  };
}

export function makeProposal(specialistId: string, actions: ProposedAction[] = []): Proposal {
  return { specialistId, specialistName: specialistId, rationale: 'because', confidence: 0.5, actions, extractionTier: 1 };
}

export function proposalBlock(actions: ProposedAction[], extra: { rationale?: string; confidence?: number } = {}): string {
  return `Here is my proposal.\n<!-- conclave-json\n${JSON.stringify({ ...extra, actions })}\n-->`;
}

export function verdictBlock(scores: RubricPoints, notes = 'fine'): string {
  return `Assessment.\n<!-- conclave-json\n${JSON.stringify({ scores, notes })}\n-->`;
}

export function points(correctness: number, completeness: number, safety: number, best_practices: number, clarity: number): RubricPoints {
  return { correctness, completeness, safety, best_practices, clarity };
}

/** Never settles; only the caller's abort signal ends the wait. */
export function hang(): Promise<string> {
  return new Promise<string>(() => undefined);
}

export type Responder = (request: CompletionRequest, signal: AbortSignal, call: number) => Promise<string>;

/** In-process backend that routes each request to `respond` and records it. */
export class FakeBackend implements ModelBackend {
  readonly requests: CompletionRequest[] = [];
  private readonly calls = new Map<string, number>();

  constructor(private readonly respond: Responder) {}

  complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    this.requests.push(request);
    const call = (this.calls.get(request.label) ?? 0) + 1;
    this.calls.set(request.label, call);
    return this.respond(request, signal, call);
  }

  callsFor(label: string): number {
    return this.calls.get(label) ?? 0;
  }
}

/** Sync runner that reports a fixed exit and records the manifests it was given. */
export class FakeSyncRunner implements SyncRunner {
  readonly runs: string[] = [];

  constructor(private readonly exit: SyncExit = { exitCode: 0 }) {}

  async run(manifestPath: string): Promise<SyncExit> {
    this.runs.push(manifestPath);
    return this.exit;
  }
}
