import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_CONFIG, SPECIALIST_DEFINITIONS, configTemplate, mkdirSafe, splitCommand } from '@conclave/shared';
import { configPathFor, getFlagValue } from '../config.js';
import { openDb } from '../db/connection.js';
import { specialistPath } from '../agents/spawn.js';
import * as fmt from '../output/format.js';

export async function init(args: string[]): Promise<void> {
  const projectRoot = process.cwd();
  const force = args.includes('--force');
  const manifest = getFlagValue(args, '--manifest') ?? DEFAULT_CONFIG.project.manifest;
  const syncRaw = getFlagValue(args, '--sync');
  const syncCommand = syncRaw ? splitCommand(syncRaw) : null;

  fmt.header('Initializing conclave');

  const conclaveDir = path.join(projectRoot, '.conclave');
  mkdirSafe(conclaveDir);
  fmt.info('Created .conclave/');

  const configPath = configPathFor(projectRoot);
  if (!fs.existsSync(configPath) || force) {
    fs.writeFileSync(configPath, configTemplate({
      name: path.basename(projectRoot),
      manifest,
      syncCommand: syncCommand && syncCommand.length > 0 ? syncCommand : null,
    }) + '\n');
    fmt.info('Created .conclave/config.json');
  } else {
    fmt.info('Kept existing .conclave/config.json (use --force to overwrite)');
  }

  mkdirSafe(path.join(conclaveDir, 'specialists'));
  let written = 0;
  for (const [id, content] of Object.entries(SPECIALIST_DEFINITIONS)) {
    const filePath = specialistPath(projectRoot, id);
    if (fs.existsSync(filePath) && !force) continue;
    fs.writeFileSync(filePath, content);
    written++;
  }
  fmt.info(`Wrote ${written} specialist definition(s) to .conclave/specialists/`);

  // Opening the ledger creates it and runs migrations.
  openDb(projectRoot).close();
  fmt.info('Created round ledger .conclave/conclave.db');

  if (!fs.existsSync(path.resolve(projectRoot, manifest))) {
    fmt.warn(`${manifest} not found. Create it or pass --manifest PATH.`);
  }
  fmt.success('Initialized. Run `conclave check` to verify readiness.');
}
