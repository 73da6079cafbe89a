import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { ManifestError, errorMessage } from '../errors.js';
import { scanTables, scanArray, sameKey, TomlLayoutError } from './scan.js';
import type { ArraySpan, TableSection } from './scan.js';
import { detectEol } from './splice.js';
import type { EditPath } from './types.js';

const OPTIONAL_PREFIX = 'optional-dependencies.';

const ManifestShapeSchema = z.object({
  project: z.object({
    dependencies: z.array(z.string()).optional(),
    'optional-dependencies': z.record(z.array(z.string())).optional(),
  }).passthrough().optional(),
}).passthrough();

/** Where a list lives, or where it would be created. */
export type ListSite =
  | { kind: 'array'; span: ArraySpan }
  /** The table exists; insert `key = [...]` at `insertAt` (a line end). */
  | { kind: 'absent-key'; insertAt: number; key: string }
  /** No table to hold the list; append a new `[table]` at the end of the file. */
  | { kind: 'absent-table'; table: string; key: string };

export interface DependencyList {
  readonly path: EditPath;
  readonly entries: readonly string[];
}

export function optionalPath(group: string): EditPath {
  return `${OPTIONAL_PREFIX}${group}`;
}

/** Full key path below the document root, e.g. `['project', 'optional-dependencies', 'dev']`. */
function keyPathOf(editPath: EditPath): string[] {
  if (editPath === 'dependencies') return ['project', 'dependencies'];
  return ['project', 'optional-dependencies', editPath.slice(OPTIONAL_PREFIX.length)];
}

/**
 * Immutable view of a pyproject.toml: the raw text, the parsed dependency
 * lists, and the layout needed to edit those lists in place.
 */
export class ManifestDocument {
  private constructor(
    readonly path: string,
    readonly text: string,
    private readonly dependencies: readonly string[] | null,
    private readonly optional: Readonly<Record<string, readonly string[]>>,
    private readonly sections: readonly TableSection[],
  ) {}

  static parse(filePath: string, text: string): ManifestDocument {
    let data: unknown;
    try {
      data = parseToml(text);
    } catch (err) {
      throw new ManifestError(`${filePath} is not valid TOML: ${errorMessage(err)}`, filePath, { cause: err });
    }

    const shape = ManifestShapeSchema.safeParse(data);
    if (!shape.success) {
      const issue = shape.error.issues[0];
      throw new ManifestError(`${filePath}: ${issue.path.join('.')}: ${issue.message}`, filePath, { cause: shape.error });
    }
    const project = shape.data.project;
    if (!project) {
      throw new ManifestError(`${filePath} has no [project] table`, filePath);
    }

    let sections: TableSection[];
    try {
      sections = scanTables(text);
    } catch (err) {
      if (err instanceof TomlLayoutError) {
        throw new ManifestError(`${filePath}: unsupported TOML layout: ${err.message}`, filePath, { cause: err });
      }
      throw err;
    }

    return new ManifestDocument(
      filePath,
      text,
      project.dependencies ?? null,
      project['optional-dependencies'] ?? {},
      sections,
    );
  }

  static async load(filePath: string): Promise<ManifestDocument> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (err) {
      throw new ManifestError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
    return ManifestDocument.parse(filePath, text);
  }

  get fileName(): string {
    return path.basename(this.path);
  }

  get eol(): '\r\n' | '\n' {
    return detectEol(this.text);
  }

  /** Entries of the list at `editPath`, or null when the list is not declared. */
  list(editPath: EditPath): readonly string[] | null {
    if (editPath === 'dependencies') return this.dependencies;
    const group = editPath.slice(OPTIONAL_PREFIX.length);
    return Object.hasOwn(this.optional, group) ? this.optional[group] : null;
  }

  optionalGroups(): string[] {
    return Object.keys(this.optional);
  }

  /** Every declared list: main dependencies first, then optional groups in file order. */
  lists(): DependencyList[] {
    const out: DependencyList[] = [];
    if (this.dependencies) out.push({ path: 'dependencies', entries: this.dependencies });
    for (const group of this.optionalGroups()) {
      out.push({ path: optionalPath(group), entries: this.optional[group] });
    }
    return out;
  }

  /** Re-parse with new text; the result must still be a valid manifest. */
  withText(text: string): ManifestDocument {
    return ManifestDocument.parse(this.path, text);
  }

  site(editPath: EditPath): ListSite {
    const keyPath = keyPathOf(editPath);
    const key = keyPath[keyPath.length - 1];

    for (const section of this.sections) {
      if (section.isArrayTable) continue;
      for (const pair of section.pairs) {
        if (!sameKey([...section.path, ...pair.key], keyPath)) continue;
        if (this.text[pair.valueStart] !== '[') {
          throw new ManifestError(`${this.path}: project.${editPath} is not an array literal`, this.path);
        }
        return { kind: 'array', span: scanArray(this.text, pair.valueStart) };
      }
    }

    if (this.list(editPath) !== null) {
      throw new ManifestError(`${this.path}: project.${editPath} is declared in a form that cannot be edited in place`, this.path);
    }

    const projectTable = this.findTable(['project']);
    if (editPath === 'dependencies') {
      if (!projectTable) {
        throw new ManifestError(`${this.path}: [project] is not declared as a table header`, this.path);
      }
      return { kind: 'absent-key', insertAt: this.insertPoint(projectTable), key };
    }

    const groupTable = this.findTable(['project', 'optional-dependencies']);
    if (groupTable) return { kind: 'absent-key', insertAt: this.insertPoint(groupTable), key };

    // Groups written as dotted keys inside [project] get a sibling dotted key.
    if (projectTable?.pairs.some(p => p.key.length === 2 && p.key[0] === 'optional-dependencies')) {
      return { kind: 'absent-key', insertAt: this.insertPoint(projectTable), key: `optional-dependencies.${key}` };
    }
    if (this.optionalGroups().length > 0 || projectTable?.pairs.some(p => p.key[0] === 'optional-dependencies')) {
      throw new ManifestError(`${this.path}: project.optional-dependencies is declared in a form that cannot be edited in place`, this.path);
    }
    return { kind: 'absent-table', table: 'project.optional-dependencies', key };
  }

  private findTable(tablePath: readonly string[]): TableSection | undefined {
    return this.sections.find(s => !s.isArrayTable && sameKey(s.path, tablePath));
  }

  private insertPoint(section: TableSection): number {
    const last = section.pairs[section.pairs.length - 1];
    return last ? last.lineEnd : section.headerLineEnd;
  }
}
