import * as fs from 'node:fs';
import { z } from 'zod';
import { RoundError, errorMessage } from './errors.js';
import { CONTEXT_LIMITS, truncateContext } from './config.js';

const StatusSchema = z.enum(['pass', 'fail']);

const CheckSchema = z.object({
  status: StatusSchema,
  output: z.string().optional(),
});

export const DiagnosticsSchema = z.object({
  tests: CheckSchema.optional(),
  formatting: CheckSchema.optional(),
  types: CheckSchema.optional(),
}).strict();

export type Diagnostics = z.infer<typeof DiagnosticsSchema>;

const CHECK_ORDER = ['tests', 'formatting', 'types'] as const;

export function parseDiagnostics(raw: unknown, source: string): Diagnostics {
  const result = DiagnosticsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new RoundError(`Invalid diagnostics in ${source}: ${where}${issue.message}`, null, { cause: result.error });
  }
  return result.data;
}

export function loadDiagnostics(filePath: string): Diagnostics {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new RoundError(`Cannot read diagnostics ${filePath}: ${errorMessage(err)}`, null, { cause: err });
  }
  return parseDiagnostics(raw, filePath);
}

/** Prompt section for diagnostics; captured output is truncated. */
export function formatDiagnostics(diagnostics: Diagnostics | null, limit: number = CONTEXT_LIMITS.diagnosticOutput): string {
  const lines: string[] = [];
  for (const name of CHECK_ORDER) {
    const check = diagnostics?.[name];
    if (!check) continue;
    lines.push(`- ${name}: ${check.status}`);
    if (check.output && check.output.trim()) {
      lines.push('```', truncateContext(check.output.trim(), limit), '```');
    }
  }
  return lines.length > 0 ? lines.join('\n') : 'No diagnostics provided.';
}
