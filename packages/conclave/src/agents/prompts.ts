import type { Task } from '../types.js';
import { CONTEXT_LIMITS, truncateContext } from '../config.js';
import { formatDiagnostics } from '../diagnostics.js';
import { RUBRIC_CEILINGS, RUBRIC_DESCRIPTIONS, RUBRIC_DIMENSIONS, RUBRIC_MAX_TOTAL } from '../round/rubric.js';
import type { CompletionRequest, Proposal, SpecialistDescriptor } from './types.js';

/**
 * Prompt builders. Pure functions of their inputs: the same task and
 * proposal always produce the same request.
 */

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (whole, key: string) =>
    Object.hasOwn(values, key) ? values[key] : whole,
  );
}

function manifestSection(task: Task): string {
  const text = truncateContext(task.manifest.text, CONTEXT_LIMITS.manifest);
  return `## Current ${task.manifest.fileName}\n\`\`\`toml\n${text.trimEnd()}\n\`\`\``;
}

function taskSections(task: Task): string {
  return [
    `## Request\n${task.request.trim()}`,
    `## Diagnostics\n${formatDiagnostics(task.diagnostics)}`,
    manifestSection(task),
  ].join('\n\n');
}

export function buildSpecialistRequest(task: Task, descriptor: SpecialistDescriptor): CompletionRequest {
  const systemPrompt = renderTemplate(descriptor.instructions, {
    manifest: task.manifest.fileName,
    allowed_paths: descriptor.allowedPaths.join(', '),
  });
  const prompt = `${taskSections(task)}\n\n` +
    'Propose the manifest actions that satisfy the request. ' +
    'Your LAST line of output MUST be the <!-- conclave-json --> block.';
  return { label: descriptor.id, model: descriptor.model, systemPrompt, prompt };
}

const RUBRIC_LINES = RUBRIC_DIMENSIONS
  .map(dim => `- ${dim} (0-${RUBRIC_CEILINGS[dim]}): ${RUBRIC_DESCRIPTIONS[dim]}`)
  .join('\n');

export const JUDGE_SYSTEM_PROMPT =
  'You are the Judge. You score one proposed change to a Python project manifest against a fixed rubric. ' +
  'You see only this proposal; score it on its own merits.\n\n' +
  `Rubric (integer points, total out of ${RUBRIC_MAX_TOTAL}):\n${RUBRIC_LINES}\n\n` +
  'End your response with exactly one block:\n' +
  '<!-- conclave-json {"scores": {"correctness": 0, "completeness": 0, "safety": 0, "best_practices": 0, "clarity": 0}, "notes": "one paragraph"} -->';

export function formatProposal(proposal: Proposal): string {
  const actions = proposal.actions.length > 0
    ? proposal.actions.map(a => `- ${a.kind} ${a.path}: ${a.value}`).join('\n')
    : '- (no actions)';
  return [
    `Specialist: ${proposal.specialistName}`,
    `Confidence: ${proposal.confidence}`,
    `Rationale:\n${truncateContext(proposal.rationale, CONTEXT_LIMITS.rationale)}`,
    `Actions:\n${actions}`,
  ].join('\n');
}

export function buildJudgeRequest(task: Task, proposal: Proposal, model: string): CompletionRequest {
  const prompt = `${taskSections(task)}\n\n## Proposal\n${formatProposal(proposal)}\n\n` +
    'Score this proposal. Your LAST line of output MUST be the <!-- conclave-json --> block.';
  return { label: `judge:${proposal.specialistId}`, model, systemPrompt: JUDGE_SYSTEM_PROMPT, prompt };
}
