import { loadConfig, resolveManifestPath } from '../config.js';
import { findProjectRoot } from '../db/connection.js';
import { ManifestDocument } from '../manifest/document.js';
import * as fmt from '../output/format.js';

export async function deps(isJson: boolean): Promise<void> {
  const root = findProjectRoot() ?? process.cwd();
  const config = loadConfig(root);
  const manifest = await ManifestDocument.load(resolveManifestPath(root, config));
  const lists = manifest.lists();

  if (isJson) {
    console.log(JSON.stringify({
      manifest: manifest.path,
      lists: Object.fromEntries(lists.map(l => [l.path, l.entries])),
    }, null, 2));
    return;
  }

  fmt.header(`Dependencies in ${manifest.fileName}`);
  if (lists.length === 0) {
    console.log('  No dependency lists declared.\n');
    return;
  }
  for (const list of lists) {
    console.log(`${fmt.bold(list.path)} ${fmt.dim(`(${list.entries.length})`)}`);
    for (const entry of list.entries) {
      console.log(`  - ${entry}`);
    }
    console.log();
  }
}
