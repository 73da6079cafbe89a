/**
 * Just enough PEP 508 to identify which package a requirement string names.
 * Specifiers, extras and markers are carried through untouched.
 */

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
// What may follow the name: extras, a version spec, a marker or a URL reference.
const AFTER_NAME = /^(?:\[|\(|<|>|=|!|~|;|@)/;

export interface Requirement {
  readonly raw: string;
  readonly name: string;
  readonly normalized: string;
}

/** Lower-case, and collapse runs of `-`, `_` and `.` into a single `-`. */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

export function parseRequirement(raw: string): Requirement | null {
  const match = NAME_PATTERN.exec(raw);
  if (!match) return null;
  const rest = raw.slice(match[0].length).trim();
  if (rest && !AFTER_NAME.test(rest)) return null;
  return { raw: raw.trim(), name: match[1], normalized: normalizePackageName(match[1]) };
}

/** A bare package name, as `remove` takes. */
export function isPackageName(value: string): boolean {
  const req = parseRequirement(value);
  return req !== null && req.name === value.trim();
}

/** Index of the entry naming the same package as `name`, or -1. */
export function findRequirement(entries: readonly string[], name: string): number {
  const target = normalizePackageName(parseRequirement(name)?.name ?? name.trim());
  return entries.findIndex(entry => parseRequirement(entry)?.normalized === target);
}
