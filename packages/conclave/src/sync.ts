import { spawn } from 'node:child_process';
import type { StdioOptions } from 'node:child_process';
import * as fmt from './output/format.js';
import { errorMessage } from './errors.js';

export interface SyncExit {
  /** Null when the process was killed by a signal or never started. */
  readonly exitCode: number | null;
  readonly detail?: string;
}

/**
 * Brings the environment in line with the committed manifest. Only the exit
 * status is observed.
 */
export interface SyncRunner {
  run(manifestPath: string): Promise<SyncExit>;
}

/** Child stdout goes to our stderr; stdout is reserved for the --json report. */
export const SYNC_STDIO: StdioOptions = ['inherit', 2, 'inherit'];

export function createCommandSyncRunner(command: readonly string[], cwd: string): SyncRunner {
  const [bin, ...args] = command;
  return {
    run: (manifestPath) => new Promise<SyncExit>(resolve => {
      fmt.info(`Running sync: ${command.join(' ')}`);
      const child = spawn(bin, args, {
        cwd,
        stdio: SYNC_STDIO,
        env: { ...process.env, CONCLAVE_MANIFEST: manifestPath },
      });
      child.once('error', err => resolve({ exitCode: null, detail: errorMessage(err) }));
      child.once('close', (code, signal) =>
        resolve(signal ? { exitCode: null, detail: `killed by ${signal}` } : { exitCode: code }));
    }),
  };
}
