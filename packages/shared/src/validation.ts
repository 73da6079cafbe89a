/**
 * Project readiness checks for conclave.
 * Surfaces what's configured, what's missing, and what that means for a round.
 * Purely informational: never blocks.
 */

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate project readiness given config and filesystem checks.
 * Accepts pre-resolved facts so the caller handles fs/exec logic.
 */
export function validateProject(checks: {
  hasConfig: boolean;
  configError: string | null;
  manifestPath: string;
  manifestExists: boolean;
  manifestError: string | null;
  dependencyCount: number;
  optionalGroups: string[];
  specialists: string[];
  missingSpecialistFiles: string[];
  syncCommand: string[] | null;
  syncCommandRunnable: boolean;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  // Config
  if (checks.configError) {
    results.push({ label: 'Config', status: 'fail', detail: checks.configError });
  } else {
    results.push(checks.hasConfig
      ? { label: 'Config', status: 'pass', detail: '.conclave/config.json loaded' }
      : { label: 'Config', status: 'warn', detail: 'No .conclave/config.json. Using defaults (run `conclave init`)' }
    );
  }

  // Manifest
  if (!checks.manifestExists) {
    results.push({ label: 'Manifest', status: 'fail', detail: `${checks.manifestPath} not found` });
  } else if (checks.manifestError) {
    results.push({ label: 'Manifest', status: 'fail', detail: checks.manifestError });
  } else {
    const groups = checks.optionalGroups.length > 0
      ? `, optional groups: ${checks.optionalGroups.join(', ')}`
      : '';
    results.push({
      label: 'Manifest',
      status: 'pass',
      detail: `${checks.manifestPath}: ${checks.dependencyCount} dependenc${checks.dependencyCount === 1 ? 'y' : 'ies'}${groups}`,
    });
  }

  // Specialists
  if (checks.specialists.length === 0) {
    results.push({ label: 'Specialists', status: 'fail', detail: 'None configured. A round needs at least one' });
  } else if (checks.missingSpecialistFiles.length > 0) {
    results.push({
      label: 'Specialists',
      status: 'warn',
      detail: `${checks.specialists.length} configured; using built-in descriptors for ${checks.missingSpecialistFiles.join(', ')}`,
    });
  } else {
    results.push({ label: 'Specialists', status: 'pass', detail: `${checks.specialists.length} configured: ${checks.specialists.join(', ')}` });
  }

  // Sync command
  if (!checks.syncCommand || checks.syncCommand.length === 0) {
    results.push({ label: 'Sync command', status: 'warn', detail: 'Not set. Committed edits will not be followed by an environment sync' });
  } else if (!checks.syncCommandRunnable) {
    results.push({ label: 'Sync command', status: 'warn', detail: `Set but not found on PATH: ${checks.syncCommand[0]}` });
  } else {
    results.push({ label: 'Sync command', status: 'pass', detail: checks.syncCommand.join(' ') });
  }

  return results;
}

// Local NO_COLOR gate: shared is independent of conclave, no cross-package import.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}
