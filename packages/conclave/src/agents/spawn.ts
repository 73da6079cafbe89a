import * as fs from 'node:fs';
import * as path from 'node:path';
import { query } from '@anthropic-ai/claude-agent-sdk';
import { SPECIALIST_DEFINITIONS } from '@conclave/shared';
import * as fmt from '../output/format.js';
import { ConfigError, ProviderError, errorMessage } from '../errors.js';
import type { ConclaveConfig } from '../types.js';
import type { CompletionRequest, ModelBackend, SpecialistDescriptor } from './types.js';

export function specialistPath(projectRoot: string, id: string): string {
  return path.join(projectRoot, '.conclave', 'specialists', `${id}.md`);
}

function extractYamlField(yaml: string, field: string): string | null {
  const match = yaml.match(new RegExp(`^${field}:\\s*(.+)$`, 'm'));
  return match ? match[1].trim() : null;
}

/**
 * Parse a specialist definition: YAML frontmatter (name, model, allowed_paths)
 * plus a markdown body used as the instruction template.
 */
export function parseSpecialistDefinition(
  id: string,
  content: string,
  config: ConclaveConfig,
  source: SpecialistDescriptor['source'],
  origin: string,
): SpecialistDescriptor {
  const frontmatterMatch = content.replace(/\r\n/g, '\n').match(/^---\n([\s\S]*?)\n---\n([\s\S]*)$/);
  if (!frontmatterMatch) {
    throw new ConfigError(origin, 'specialist definition is missing YAML frontmatter');
  }

  const frontmatter = frontmatterMatch[1];
  const instructions = frontmatterMatch[2].trim();

  // Simple YAML parsing for our known fields (avoid yaml dependency)
  const name = extractYamlField(frontmatter, 'name') ?? id;
  const model = config.models[id] ?? extractYamlField(frontmatter, 'model') ?? config.models.specialist;
  const allowedPaths = (extractYamlField(frontmatter, 'allowed_paths') ?? '')
    .replace(/[\[\]]/g, '')
    .split(',')
    .map(p => p.trim())
    .filter(Boolean);

  if (allowedPaths.length === 0) {
    throw new ConfigError(origin, `specialist ${id} declares no allowed_paths`);
  }
  if (!instructions) {
    throw new ConfigError(origin, `specialist ${id} has no instructions`);
  }
  return Object.freeze({ id, name, model, allowedPaths: Object.freeze(allowedPaths), instructions, source });
}

/**
 * Load one specialist from .conclave/specialists/{id}.md, falling back to the
 * built-in definition when the project has none.
 */
export function loadSpecialistDescriptor(id: string, config: ConclaveConfig, projectRoot: string): SpecialistDescriptor {
  const filePath = specialistPath(projectRoot, id);
  if (fs.existsSync(filePath)) {
    return parseSpecialistDefinition(id, fs.readFileSync(filePath, 'utf-8'), config, 'project', filePath);
  }
  const builtin = SPECIALIST_DEFINITIONS[id];
  if (builtin === undefined) {
    throw new ConfigError(filePath, `no definition for specialist "${id}" (not a built-in: ${Object.keys(SPECIALIST_DEFINITIONS).join(', ')})`);
  }
  return parseSpecialistDefinition(id, builtin, config, 'builtin', `builtin:${id}`);
}

/** The round's specialists, in config order. */
export function loadSpecialistDescriptors(config: ConclaveConfig, projectRoot: string): SpecialistDescriptor[] {
  return config.specialists.map(id => loadSpecialistDescriptor(id, config, projectRoot));
}

/**
 * Run one tool-free query through the Claude Agent SDK and collect its text.
 */
async function runQuery(opts: {
  prompt: string;
  model: string;
  systemPrompt: string;
  cwd: string;
  label: string;
  abortController: AbortController;
}): Promise<{ text: string; costUsd: number }> {
  const conversation = query({
    prompt: opts.prompt,
    options: {
      model: opts.model,
      systemPrompt: opts.systemPrompt,
      cwd: opts.cwd,
      allowedTools: [],
      permissionMode: 'default',
      maxTurns: 1,
      abortController: opts.abortController,
    },
  });

  const textParts: string[] = [];
  let costUsd = 0;

  for await (const message of conversation) {
    if (message.type === 'assistant') {
      for (const block of message.message.content) {
        if (block.type === 'text') {
          textParts.push(block.text);
        }
      }
    } else if (message.type === 'result') {
      if (message.subtype === 'success') {
        costUsd = message.total_cost_usd;
      } else if (message.subtype !== 'error_max_turns') {
        // A single-turn query that hits max turns still produced its text.
        throw new ProviderError(`[${opts.label}] Agent query failed (${message.subtype})`);
      }
    }
  }

  return { text: textParts.join('\n\n'), costUsd };
}

/**
 * ModelBackend over the Claude Agent SDK. The SDK reads its own credentials
 * from the environment.
 */
export function createAgentSdkBackend(opts: { cwd: string }): ModelBackend {
  return {
    async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
      const abortController = new AbortController();
      const onAbort = () => abortController.abort(signal.reason);
      if (signal.aborted) abortController.abort(signal.reason);
      else signal.addEventListener('abort', onAbort, { once: true });

      try {
        fmt.info(`[${request.label}] Querying ${request.model}...`);
        const { text, costUsd } = await runQuery({
          prompt: request.prompt,
          model: request.model,
          systemPrompt: request.systemPrompt,
          cwd: opts.cwd,
          label: request.label,
          abortController,
        });
        fmt.info(`[${request.label}] Complete (cost: $${costUsd.toFixed(4)})`);
        return text;
      } catch (err) {
        if (err instanceof ProviderError || signal.aborted) throw err;
        throw new ProviderError(`[${request.label}] ${errorMessage(err)}`, { cause: err });
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    },
  };
}
