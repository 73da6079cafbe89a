#!/usr/bin/env -S node --import tsx

import * as fs from 'node:fs';
import { z } from 'zod';
import * as fmt from './output/format.js';

const VERSION = z.object({ version: z.string() }).parse(
  JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')),
).version;

async function main(): Promise<void> {
  // First Ctrl+C cancels the round; a second one exits.
  const controller = new AbortController();
  let sigintCount = 0;
  process.on('SIGINT', () => {
    sigintCount++;
    if (sigintCount >= 2) process.exit(130);
    controller.abort();
    fmt.warn('Interrupt received. Cancelling round (edits already being applied still finish)...');
  });

  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  if (isJson) fmt.routeLogsToStderr();
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest);
        break;
      }
      case 'check': {
        const { check } = await import('./commands/check.js');
        await check();
        break;
      }
      case 'deps': {
        const { deps } = await import('./commands/deps.js');
        await deps(isJson);
        break;
      }
      case 'run': {
        const { run } = await import('./commands/run.js');
        await run(rest, isJson, controller.signal);
        break;
      }
      case 'history': {
        const { history } = await import('./commands/history.js');
        await history(rest, isJson);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    fmt.error(`Error: ${msg}`);
    process.exit(1);
  }
}

function printHelp(): void {
  console.log(`
conclave v${VERSION}: specialist proposals, judged, applied to pyproject.toml

Usage: conclave <command> [options]

Setup:
  init                       Create .conclave/ with config and specialist definitions
    --manifest PATH          Manifest to manage (default: pyproject.toml)
    --sync "CMD"             Command to run after a committed edit
    --force                  Overwrite existing config and definitions
  check                      Verify config, manifest, specialists and sync command

Rounds:
  run "request"              Collect, judge and apply the best proposal
    --dry-run                Show the diff without writing
    --show-all               Show every ranked proposal; never edit
    --diagnostics FILE       Attach test/formatting/type-check results (JSON)

Queries:
  deps [--json]              List dependencies and optional groups
  history [--limit N]        Recent rounds from the ledger

Flags:
  --json                     Output as JSON
  --version, -v              Print version
  --help, -h                 Print this help

Exit codes:
  0 success, 1 round or command failed, 2 edit committed but sync failed,
  130 interrupted twice
`);
}

void main();
