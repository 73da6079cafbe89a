import * as fs from 'node:fs';
import { createTwoFilesPatch } from 'diff';
import * as fmt from '../output/format.js';
import { ConflictError, ManifestError, StaleManifestError, errorMessage } from '../errors.js';
import { ManifestDocument } from './document.js';
import { acquireManifestLock } from './lock.js';
import type { ManifestLock } from './lock.js';
import { findRequirement, parseRequirement } from './requirement.js';
import { applySplices, appendElement, quoteRequirement, quoteStyleOf, removeElement, replaceElement } from './splice.js';
import type { TextSplice } from './splice.js';
import type { Edit } from './types.js';

export interface EditChange {
  readonly edit: Edit;
  readonly before: readonly string[];
  readonly after: readonly string[];
}

export interface EditPlan {
  readonly original: ManifestDocument;
  readonly document: ManifestDocument;
  readonly changes: readonly EditChange[];
  /** Unified diff of the manifest text; empty when nothing changes. */
  readonly diff: string;
}

export interface ApplyResult extends EditPlan {
  readonly committed: boolean;
}

export interface ApplyOptions {
  dryRun: boolean;
  leaseSeconds: number;
}

/** Pairs of edits that target the same list. */
export function detectConflicts(edits: readonly Edit[]): [Edit, Edit][] {
  const conflicts: [Edit, Edit][] = [];
  const firstByPath = new Map<string, Edit>();
  for (const edit of edits) {
    const first = firstByPath.get(edit.path);
    if (first) {
      conflicts.push([first, edit]);
    } else {
      firstByPath.set(edit.path, edit);
    }
  }
  return conflicts;
}

function sameEntries(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function packageName(value: string): string {
  return parseRequirement(value)?.name ?? value.trim();
}

/** Splice one edit into the document's text and verify the parsed result. */
export function applyEdit(doc: ManifestDocument, edit: Edit): { document: ManifestDocument; change: EditChange } {
  const before = doc.list(edit.path) ?? [];
  const site = doc.site(edit.path);
  const eol = doc.eol;

  let after: string[];
  let text: string;

  if (edit.kind === 'add') {
    after = [...before, edit.value];
    if (site.kind === 'array') {
      const literal = quoteRequirement(edit.value, quoteStyleOf(site.span));
      text = applySplices(doc.text, appendElement(doc.text, site.span, literal, eol));
    } else if (site.kind === 'absent-key') {
      const line = `${eol}${site.key} = [${quoteRequirement(edit.value, null)}]`;
      text = applySplices(doc.text, [{ start: site.insertAt, end: site.insertAt, insert: line }]);
    } else {
      const lead = doc.text.length === 0 || doc.text.endsWith('\n') ? '' : eol;
      text = `${doc.text}${lead}${eol}[${site.table}]${eol}${site.key} = [${quoteRequirement(edit.value, null)}]${eol}`;
    }
  } else {
    const index = findRequirement(before, edit.value);
    if (index < 0 || site.kind !== 'array') {
      throw new ManifestError(`Cannot ${edit.kind} ${packageName(edit.value)}: not listed in ${edit.path}`, doc.path);
    }
    if (site.span.elements.length !== before.length) {
      throw new ManifestError(`${doc.path}: ${edit.path} layout does not match its parsed entries`, doc.path);
    }
    let splices: TextSplice[];
    if (edit.kind === 'update') {
      after = before.map((entry, i) => (i === index ? edit.value : entry));
      splices = replaceElement(site.span, index, quoteRequirement(edit.value, site.span.elements[index].quote));
    } else {
      after = before.filter((_, i) => i !== index);
      splices = removeElement(doc.text, site.span, index);
    }
    text = applySplices(doc.text, splices);
  }

  const next = doc.withText(text);
  const actual = next.list(edit.path) ?? [];
  if (!sameEntries(actual, after)) {
    throw new ManifestError(
      `${edit.kind} ${edit.value} in ${edit.path} produced [${actual.join(', ')}], expected [${after.join(', ')}]`,
      doc.path,
    );
  }
  return { document: next, change: { edit, before, after } };
}

export function renderDiff(original: ManifestDocument, next: ManifestDocument): string {
  if (original.text === next.text) return '';
  const name = original.fileName;
  return createTwoFilesPatch(`a/${name}`, `b/${name}`, original.text, next.text);
}

/**
 * Compute the manifest that results from applying every edit, in order,
 * without touching disk. Conflicts are rejected before any edit is tried.
 */
export function planEdits(doc: ManifestDocument, edits: readonly Edit[]): EditPlan {
  const conflicts = detectConflicts(edits);
  if (conflicts.length > 0) throw new ConflictError(conflicts);

  let current = doc;
  const changes: EditChange[] = [];
  for (const edit of edits) {
    const { document, change } = applyEdit(current, edit);
    current = document;
    changes.push(change);
  }
  return { original: doc, document: current, changes, diff: renderDiff(doc, current) };
}

/**
 * Apply edits to the manifest. A dry run returns the same plan and diff a real
 * run would, and writes nothing.
 */
export async function applyEdits(doc: ManifestDocument, edits: readonly Edit[], opts: ApplyOptions): Promise<ApplyResult> {
  const plan = planEdits(doc, edits);
  if (opts.dryRun || plan.diff === '') return { ...plan, committed: false };
  await persistManifest(doc, plan.document, opts.leaseSeconds);
  return { ...plan, committed: true };
}

export type LockAcquirer = (manifestPath: string, leaseSeconds: number) => Promise<ManifestLock>;

async function releaseQuietly(lock: ManifestLock): Promise<void> {
  try {
    await lock.release();
  } catch (err) {
    fmt.warn(`Could not release lock ${lock.lockPath}: ${errorMessage(err)}`);
  }
}

/**
 * Replace the manifest on disk under the advisory lock. Refuses to write when
 * the file no longer holds the text the round started from. Once the rename
 * has happened the write stands, even if the lock cannot be released.
 */
export async function persistManifest(
  original: ManifestDocument,
  next: ManifestDocument,
  leaseSeconds: number,
  acquire: LockAcquirer = acquireManifestLock,
): Promise<void> {
  const lock = await acquire(original.path, leaseSeconds);
  try {
    const onDisk = await fs.promises.readFile(original.path, 'utf-8');
    if (onDisk !== original.text) throw new StaleManifestError(original.path);

    const tmpPath = `${original.path}.${process.pid}.tmp`;
    try {
      await fs.promises.writeFile(tmpPath, next.text, 'utf-8');
      await fs.promises.rename(tmpPath, original.path);
    } catch (err) {
      await fs.promises.rm(tmpPath, { force: true });
      throw new ManifestError(`Failed to write ${original.path}`, original.path, { cause: err });
    }
  } catch (err) {
    await releaseQuietly(lock);
    throw err;
  }
  await releaseQuietly(lock);
}
