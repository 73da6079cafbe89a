export const EDIT_KINDS = ['add', 'update', 'remove'] as const;

export type EditKind = typeof EDIT_KINDS[number];

/** Allow-listed list paths, relative to the [project] table. */
export type EditPath = 'dependencies' | `optional-dependencies.${string}`;

export interface Edit {
  readonly kind: EditKind;
  readonly path: EditPath;
  /** Requirement string for add/update, package name for remove. */
  readonly value: string;
}

export interface Ambiguity {
  readonly edit: Edit;
  readonly reason: string;
}
