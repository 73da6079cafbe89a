import * as path from 'node:path';
import { loadConfig, getFlagValue, resolveManifestPath } from '../config.js';
import { findProjectRoot, openDb } from '../db/connection.js';
import { createSqliteLedger } from '../db/ledger.js';
import { loadDiagnostics } from '../diagnostics.js';
import { createAgentSdkBackend, loadSpecialistDescriptors } from '../agents/spawn.js';
import { ManifestDocument } from '../manifest/document.js';
import { runRound } from '../round/orchestrator.js';
import type { RoundReport } from '../round/types.js';
import { AggregateFailure, ConflictError, ValidationError } from '../errors.js';
import type { RoundError } from '../errors.js';
import { RUBRIC_DIMENSIONS } from '../round/rubric.js';
import type { RoundMode, RoundPhase } from '../state/types.js';
import { createCommandSyncRunner } from '../sync.js';
import type { Task } from '../types.js';
import * as fmt from '../output/format.js';

export interface RunArgs {
  request: string;
  mode: RoundMode;
  diagnosticsPath: string | null;
}

const VALUE_FLAGS = new Set(['--diagnostics']);

export function parseRunArgs(args: string[]): RunArgs {
  if (args.includes('--dry-run') && args.includes('--show-all')) {
    throw new Error('--dry-run and --show-all cannot be combined');
  }
  const mode: RoundMode = args.includes('--show-all') ? 'show-all' : args.includes('--dry-run') ? 'dry-run' : 'apply';

  const words: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.has(args[i])) { i++; continue; }
    if (args[i].startsWith('--')) continue;
    words.push(args[i]);
  }
  const request = words.join(' ').trim();
  if (!request) {
    throw new Error('Usage: conclave run "<request>" [--dry-run | --show-all] [--diagnostics FILE] [--json]');
  }
  return { request, mode, diagnosticsPath: getFlagValue(args, '--diagnostics') ?? null };
}

/** 0 on success, 1 when the round failed, 2 when the edit committed but sync failed. */
export function exitCodeFor(report: RoundReport): number {
  if (report.status === 'failed') return 1;
  if (report.sync?.status === 'failed') return 2;
  return 0;
}

/** The error plus whatever the caller needs to resolve it. */
export function errorToJson(error: RoundError, phase: RoundPhase | null): Record<string, unknown> {
  const json: Record<string, unknown> = { name: error.name, message: error.message, phase };
  if (error instanceof ConflictError) json.conflicts = error.conflicts;
  if (error instanceof ValidationError) {
    json.specialist = error.specialistId;
    json.rejected = error.rejected;
  }
  if (error instanceof AggregateFailure) json.failures = error.failures;
  return json;
}

export function reportToJson(report: RoundReport): Record<string, unknown> {
  return {
    status: report.status,
    mode: report.mode,
    phases: report.phases,
    ranked: report.ranked.map(r => ({
      rank: r.rank,
      specialist: r.proposal.specialistId,
      score: { ...r.score },
      needsManualReview: r.needsManualReview,
      notes: r.notes,
      confidence: r.proposal.confidence,
      rationale: r.proposal.rationale,
      actions: r.proposal.actions,
    })),
    winner: report.winner?.proposal.specialistId ?? null,
    failures: report.failures,
    edits: report.edits,
    ambiguities: report.ambiguities.map(a => ({ ...a.edit, reason: a.reason })),
    diff: report.diff,
    committed: report.committed,
    downgradedToDryRun: report.downgradedToDryRun,
    sync: report.sync === null ? null : {
      status: report.sync.status,
      ...(report.sync.status === 'skipped' ? {} : { exitCode: report.sync.exitCode }),
    },
    error: report.error ? errorToJson(report.error, report.failedPhase) : null,
  };
}

function printReport(report: RoundReport): void {
  for (const f of report.failures) {
    fmt.warn(`${f.specialistId} failed (${f.reason}) after ${f.attempts} attempt(s): ${f.message}`);
  }

  if (report.ranked.length > 0) {
    fmt.header('Ranking');
    const rows = report.ranked.map(r => [
      String(r.rank),
      r.proposal.specialistId,
      fmt.scoreColor(r.score.total),
      ...RUBRIC_DIMENSIONS.map(d => String(r.score[d])),
      r.needsManualReview ? fmt.yellow('review') : '',
    ]);
    console.log(fmt.table(['#', 'Specialist', 'Total', 'Corr', 'Comp', 'Safe', 'Best', 'Clar', ''], rows));
    console.log();
  }

  if (report.mode === 'show-all') {
    for (const r of report.ranked) {
      console.log(fmt.bold(`${r.rank}. ${r.proposal.specialistName} (${r.proposal.specialistId})`));
      if (r.proposal.rationale) console.log(`   ${r.proposal.rationale.replace(/\n/g, '\n   ')}`);
      for (const a of r.proposal.actions) {
        console.log(`   - ${a.kind} ${a.path}: ${a.value}`);
      }
      if (r.notes) console.log(fmt.dim(`   judge: ${r.notes}`));
      console.log();
    }
  }

  if (report.ambiguities.length > 0) {
    fmt.header('Ambiguous edits (not applied)');
    for (const a of report.ambiguities) {
      console.log(`  - ${a.edit.kind} ${a.edit.path}: ${a.edit.value} ${fmt.dim(`(${a.reason})`)}`);
    }
    console.log();
  }

  if (report.diff) {
    fmt.header(report.committed ? 'Applied diff' : 'Proposed diff');
    console.log(report.diff);
  } else if (report.status === 'done' && report.mode !== 'show-all') {
    fmt.info('No manifest changes.');
  }

  if (report.sync?.status === 'succeeded') fmt.success('Sync command succeeded.');
  if (report.sync?.status === 'failed') fmt.error(report.sync.error.message);

  if (report.status === 'done') {
    fmt.success(`Round ${fmt.phaseColor(report.status)} (${report.mode}).`);
  }
}

export async function run(args: string[], isJson: boolean, signal: AbortSignal): Promise<void> {
  const { request, mode, diagnosticsPath } = parseRunArgs(args);
  const root = findProjectRoot() ?? process.cwd();
  const config = loadConfig(root);
  const manifest = await ManifestDocument.load(resolveManifestPath(root, config));
  const diagnostics = diagnosticsPath ? loadDiagnostics(path.resolve(diagnosticsPath)) : null;
  const task: Task = Object.freeze({ request, diagnostics, manifest });
  const descriptors = loadSpecialistDescriptors(config, root);

  if (!isJson) {
    fmt.header(`Round (${mode}) on ${manifest.fileName}`);
    fmt.info(`Specialists: ${descriptors.map(d => d.id).join(', ')}`);
  }

  const db = openDb(root);
  try {
    const report = await runRound(task, {
      config,
      descriptors,
      backend: createAgentSdkBackend({ cwd: root }),
      sync: config.sync.command ? createCommandSyncRunner(config.sync.command, root) : null,
      ledger: createSqliteLedger(db),
    }, {
      mode,
      signal,
      onPhase: phase => fmt.info(`Phase: ${fmt.phaseColor(phase)}`),
    });

    if (isJson) {
      console.log(JSON.stringify(reportToJson(report), null, 2));
    } else {
      printReport(report);
    }
    process.exitCode = exitCodeFor(report);
  } finally {
    db.close();
  }
}
