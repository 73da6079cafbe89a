export { runRound, retryPolicyOf } from './round/orchestrator.js';
export type { RoundDependencies, RoundOptions } from './round/orchestrator.js';
export type { RoundReport, RoundLedger, SyncOutcome } from './round/types.js';
export { runSpecialistPool, DEFAULT_CONFIDENCE } from './round/pool.js';
export type { PoolResult, SpecialistOutcome } from './round/pool.js';
export { scoreProposal, judgeProposals } from './round/judge.js';
export type { JudgedProposal } from './round/judge.js';
export { rankProposals, selectWinner, compareJudged } from './round/rank.js';
export type { RankedProposal } from './round/rank.js';
export { extractEdits } from './round/extract.js';
export { createRubricScore, RUBRIC_CEILINGS, RUBRIC_DIMENSIONS } from './round/rubric.js';
export type { RubricScore } from './round/rubric.js';

export { ManifestDocument } from './manifest/document.js';
export { applyEdit, applyEdits, planEdits, detectConflicts, renderDiff } from './manifest/mutator.js';
export type { ApplyResult } from './manifest/mutator.js';
export { parseRequirement, normalizePackageName } from './manifest/requirement.js';
export type { Edit, EditKind, EditPath, Ambiguity } from './manifest/types.js';

export { createAgentSdkBackend, loadSpecialistDescriptors } from './agents/spawn.js';
export type { ModelBackend, CompletionRequest, SpecialistDescriptor, Proposal } from './agents/types.js';
export { createCommandSyncRunner } from './sync.js';
export type { SyncRunner, SyncExit } from './sync.js';
export { parseDiagnostics } from './diagnostics.js';
export { loadConfig } from './config.js';
export { createSqliteLedger } from './db/ledger.js';
export { RoundPhase } from './state/types.js';
export type { RoundMode } from './state/types.js';
export type { ConclaveConfig, Task } from './types.js';

export * from './errors.js';
