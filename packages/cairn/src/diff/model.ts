import { CairnErrno } from '../db/errors';
import { EntryKind, Hash, Mode } from '../db/model';

export type DiffEntry = {
  readonly path: string;
  readonly kind: EntryKind;
  readonly mode: Mode;
  readonly hash: Hash;
};

export type ModifiedEntry = {
  readonly path: string;
  readonly kind: EntryKind;
  readonly oldMode: Mode;
  readonly newMode: Mode;
  readonly oldHash: Hash;
  readonly newHash: Hash;
};

export type RenamedEntry = {
  readonly oldPath: string;
  readonly newPath: string;
  readonly kind: EntryKind;
  readonly oldMode: Mode;
  readonly newMode: Mode;
  readonly hash: Hash;
};

/**
 * A sub-tree that could not be compared. The rest of the diff is still complete.
 */
export type DiffProblem = {
  readonly path: string;
  readonly hash: Hash;
  readonly errno: CairnErrno;
  readonly message: string;
};

export type ChangeSet = {
  added: DiffEntry[];
  removed: DiffEntry[];
  modified: ModifiedEntry[];
  renamed: RenamedEntry[];
  problems: DiffProblem[];
};

export type RenamePairing = 'path-distance' | 'unique';

export interface DiffOptions {
  /**
   * Pair removed and added entries with identical content into `renamed`. Defaults to true.
   */
  detectRenames?: boolean;

  /**
   * How to pair candidates when several removed or added entries share one digest.
   * `path-distance` (default) pairs by smallest edit distance between paths, `unique` leaves ambiguous candidates unpaired.
   */
  renamePairing?: RenamePairing;

  /**
   * Whether an entry whose digest is unchanged but whose mode differs is reported. Defaults to `modified`.
   */
  modeChanges?: 'modified' | 'ignore';

  /**
   * Recompute the digest of every tree read during the diff.
   */
  verifyObjects?: boolean;
}

export function emptyChangeSet(): ChangeSet {
  return { added: [], removed: [], modified: [], renamed: [], problems: [] };
}
