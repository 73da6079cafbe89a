import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_CONFIG, validateProject, formatValidation } from '@conclave/shared';
import { configPathFor, loadConfig, resolveManifestPath } from '../config.js';
import { findProjectRoot } from '../db/connection.js';
import { loadSpecialistDescriptors, specialistPath } from '../agents/spawn.js';
import { ManifestDocument } from '../manifest/document.js';
import { errorMessage } from '../errors.js';
import type { ConclaveConfig } from '../types.js';
import * as fmt from '../output/format.js';

function isOnPath(bin: string, cwd: string): boolean {
  if (bin.includes('/') || bin.includes(path.sep)) return fs.existsSync(path.resolve(cwd, bin));
  const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  return dirs.some(dir => fs.existsSync(path.join(dir, bin)));
}

export async function check(): Promise<void> {
  const root = findProjectRoot() ?? process.cwd();

  let config: ConclaveConfig | null = null;
  let configError: string | null = null;
  try {
    config = loadConfig(root);
    loadSpecialistDescriptors(config, root);
  } catch (err) {
    configError = errorMessage(err);
  }

  const manifestPath = config
    ? resolveManifestPath(root, config)
    : path.resolve(root, DEFAULT_CONFIG.project.manifest);
  const manifestExists = fs.existsSync(manifestPath);
  let manifestError: string | null = null;
  let dependencyCount = 0;
  let optionalGroups: string[] = [];
  if (manifestExists) {
    try {
      const manifest = await ManifestDocument.load(manifestPath);
      dependencyCount = manifest.list('dependencies')?.length ?? 0;
      optionalGroups = manifest.optionalGroups();
    } catch (err) {
      manifestError = errorMessage(err);
    }
  }

  const specialists = [...(config?.specialists ?? DEFAULT_CONFIG.specialists)];
  const syncCommand = config?.sync.command ? [...config.sync.command] : null;

  const checks = validateProject({
    hasConfig: fs.existsSync(configPathFor(root)),
    configError,
    manifestPath: path.relative(root, manifestPath) || manifestPath,
    manifestExists,
    manifestError,
    dependencyCount,
    optionalGroups,
    specialists,
    missingSpecialistFiles: specialists.filter(id => !fs.existsSync(specialistPath(root, id))),
    syncCommand,
    syncCommandRunnable: syncCommand !== null && isOnPath(syncCommand[0], root),
  });

  fmt.header('Readiness');
  console.log(formatValidation(checks));
  console.log();
  if (checks.some(c => c.status === 'fail')) {
    process.exitCode = 1;
  }
}
