import { ValidationError } from '../errors.js';
import type { RejectedAction } from '../errors.js';
import type { ProposedAction, Proposal, SpecialistDescriptor } from '../agents/types.js';
import type { ManifestDocument } from '../manifest/document.js';
import { findRequirement, isPackageName, parseRequirement } from '../manifest/requirement.js';
import type { Ambiguity, Edit, EditPath } from '../manifest/types.js';

export interface Extraction {
  readonly edits: readonly Edit[];
  readonly ambiguities: readonly Ambiguity[];
}

const GROUP_PATH = /^optional-dependencies\.([A-Za-z0-9][A-Za-z0-9_-]*)$/;

/**
 * Map a proposal's free-form path onto the manifest allow-list.
 * Accepts an optional `project.` prefix; anything else is outside the schema.
 */
export function normalizeEditPath(raw: string): EditPath | null {
  let p = raw.trim();
  if (p.startsWith('project.')) p = p.slice('project.'.length);
  if (p === 'dependencies') return 'dependencies';
  const match = GROUP_PATH.exec(p);
  return match ? `optional-dependencies.${match[1]}` : null;
}

/** `dependencies`, `optional-dependencies.dev`, or a group wildcard `optional-dependencies.*`. */
export function pathAllowed(path: EditPath, patterns: readonly string[]): boolean {
  return patterns.some(pattern => {
    if (pattern === path) return true;
    if (pattern.endsWith('.*')) return path.startsWith(pattern.slice(0, -1));
    return false;
  });
}

function checkValue(action: ProposedAction): string | null {
  const value = action.value.trim();
  if (action.kind === 'remove') {
    return isPackageName(value) ? null : `"${value}" is not a package name`;
  }
  return parseRequirement(value) ? null : `"${value}" is not a valid requirement`;
}

function ambiguityOf(edit: Edit, manifest: ManifestDocument): Ambiguity | null {
  const entries = manifest.list(edit.path) ?? [];
  const present = findRequirement(entries, edit.value) >= 0;
  const name = parseRequirement(edit.value)?.name ?? edit.value;
  if (edit.kind === 'add' && present) {
    return { edit, reason: `${name} is already listed in ${edit.path}` };
  }
  if (edit.kind !== 'add' && !present) {
    return { edit, reason: `${name} is not listed in ${edit.path}` };
  }
  return null;
}

/**
 * Turn the winning proposal's actions into edits against the manifest.
 * Any action outside the allow-list, outside the specialist's own paths, or
 * with a malformed value rejects the whole proposal with ValidationError.
 * Edits whose effect is unclear against the current manifest are returned
 * alongside as ambiguities.
 */
export function extractEdits(
  proposal: Proposal,
  descriptor: SpecialistDescriptor,
  manifest: ManifestDocument,
): Extraction {
  const edits: Edit[] = [];
  const rejected: RejectedAction[] = [];

  for (const action of proposal.actions) {
    const path = normalizeEditPath(action.path);
    if (!path) {
      rejected.push({ action, reason: 'not an allow-listed manifest path' });
      continue;
    }
    if (!pathAllowed(path, descriptor.allowedPaths)) {
      rejected.push({ action, reason: `outside ${descriptor.id}'s allowed paths (${descriptor.allowedPaths.join(', ')})` });
      continue;
    }
    const problem = checkValue(action);
    if (problem) {
      rejected.push({ action, reason: problem });
      continue;
    }
    edits.push(Object.freeze({ kind: action.kind, path, value: action.value.trim() }));
  }

  if (rejected.length > 0) throw new ValidationError(proposal.specialistId, rejected);

  const ambiguities: Ambiguity[] = [];
  for (const edit of edits) {
    const ambiguity = ambiguityOf(edit, manifest);
    if (ambiguity) ambiguities.push(ambiguity);
  }
  return { edits, ambiguities };
}
