import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from '@conclave/shared';
import { ConfigError, errorMessage } from './errors.js';
import type { ConclaveConfig } from './types.js';

const SPECIALIST_ID = /^[a-z0-9][a-z0-9_-]*$/;

const ConfigSchema: z.ZodType<ConclaveConfig, z.ZodTypeDef, unknown> = z.object({
  project: z.object({
    name: z.string(),
    manifest: z.string().min(1),
  }),
  specialists: z.array(z.string().regex(SPECIALIST_ID, 'specialist ids are lower-case letters, digits, - and _'))
    .min(1, 'at least one specialist is required')
    .refine(ids => new Set(ids).size === ids.length, 'specialist ids must be unique'),
  models: z.object({
    specialist: z.string().min(1),
    judge: z.string().min(1),
  }).catchall(z.string().min(1)),
  round: z.object({
    specialist_timeout_ms: z.number().int().positive(),
    judge_timeout_ms: z.number().int().positive(),
    max_retries: z.number().int().min(0).max(10),
    backoff_base_ms: z.number().int().min(0),
    backoff_max_ms: z.number().int().min(0),
  }).refine(r => r.backoff_max_ms >= r.backoff_base_ms, 'backoff_max_ms must be >= backoff_base_ms'),
  sync: z.object({
    command: z.array(z.string().min(1)).min(1).nullable(),
  }),
  lock: z.object({
    lease_seconds: z.number().int().positive(),
  }),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function configPathFor(projectRoot: string): string {
  return path.join(projectRoot, '.conclave', 'config.json');
}

/**
 * Load .conclave/config.json merged over the defaults, section by section.
 * The result is validated and deep-frozen; callers pass it down explicitly.
 */
export function loadConfig(projectRoot: string): ConclaveConfig {
  const configPath = configPathFor(projectRoot);
  let loaded: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(configPath, `not valid JSON: ${errorMessage(err)}`);
    }
    if (!isRecord(parsed)) throw new ConfigError(configPath, 'must be a JSON object');
    loaded = parsed;
  }

  const section = (key: string): Record<string, unknown> => {
    const value = loaded[key];
    return isRecord(value) ? value : {};
  };
  const merged = {
    ...DEFAULT_CONFIG,
    ...loaded,
    project: { ...DEFAULT_CONFIG.project, ...section('project') },
    models: { ...DEFAULT_CONFIG.models, ...section('models') },
    round: { ...DEFAULT_CONFIG.round, ...section('round') },
    sync: { ...DEFAULT_CONFIG.sync, ...section('sync') },
    lock: { ...DEFAULT_CONFIG.lock, ...section('lock') },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(configPath, detail, result.error);
  }
  return deepFreeze(result.data);
}

export function resolveManifestPath(projectRoot: string, config: ConclaveConfig): string {
  return path.resolve(projectRoot, config.project.manifest);
}

/** Extract a flag's value from args array with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/**
 * Context size limits (chars) for what goes into prompts. A manifest larger
 * than this is unusual; captured tool output often is not.
 */
export const CONTEXT_LIMITS = {
  manifest: 20_000,
  diagnosticOutput: 4_000,
  rationale: 4_000,
} as const;

/** Truncate content with a marker if it exceeds the limit. */
export function truncateContext(content: string, limit: number): string {
  if (content.length <= limit) return content;
  return content.slice(0, limit) + '\n[TRUNCATED]';
}
