import { IObjectStore } from '../db/ObjectStore';
import { decodeObjectAndWrapErrors, loadCommitObject } from '../db/objects';
import { CairnErrno, createHashMismatchError, createObjectKindMismatchError, isCairnError } from '../db/errors';
import { Hash, Kind, TreeEntry } from '../db/model';
import { compareBytewise, errorToString, joinPath } from '../db/util';
import { ChangeSet, DiffEntry, DiffOptions, emptyChangeSet } from './model';
import { detectRenames } from './renames';

/**
 * Structural comparison of two trees. Identical sub-trees are skipped without being read,
 * so `diffTrees(store, h, h)` touches no objects at all.
 *
 * Unreadable trees become `problems`; everything else is still compared.
 */
export async function diffTrees(store: IObjectStore, a: Hash, b: Hash, options?: DiffOptions): Promise<ChangeSet> {
  const changes = emptyChangeSet();
  if (a === b) {
    return changes;
  }

  const differ = new TreeDiffer(store, options ?? {}, changes);
  await differ.diff('', a, b);

  if (options?.detectRenames ?? true) {
    const { added, removed, renamed } = detectRenames(changes.removed, changes.added, options?.renamePairing);
    changes.added = added;
    changes.removed = removed;
    changes.renamed = renamed;
  }

  changes.added.sort(byPath);
  changes.removed.sort(byPath);
  changes.modified.sort(byPath);
  changes.renamed.sort((x, y) => compareBytewise(x.oldPath, y.oldPath) || compareBytewise(x.newPath, y.newPath));
  changes.problems.sort(byPath);
  return changes;
}

/**
 * Compares the trees of two commits.
 */
export async function diffCommits(store: IObjectStore, a: Hash, b: Hash, options?: DiffOptions): Promise<ChangeSet> {
  if (a === b) {
    return emptyChangeSet();
  }

  const [commitA, commitB] = await Promise.all([loadCommitObject(store, a), loadCommitObject(store, b)]);
  return await diffTrees(store, commitA.body.tree, commitB.body.tree, options);
}

class TreeDiffer {
  constructor(
    private readonly _store: IObjectStore,
    private readonly _options: DiffOptions,
    private readonly _changes: ChangeSet,
  ) { }

  async diff(path: string, a: Hash, b: Hash): Promise<void> {
    const [entriesA, entriesB] = await Promise.all([this._loadTree(path, a), this._loadTree(path, b)]);
    if (entriesA === undefined || entriesB === undefined) {
      return;
    }

    const byNameB = new Map(entriesB.map(entry => [entry.name, entry]));
    const subtrees: Promise<void>[] = [];
    for (const entryA of entriesA) {
      const entryPath = joinPath(path, entryA.name);
      const entryB = byNameB.get(entryA.name);
      byNameB.delete(entryA.name);
      if (entryB === undefined) {
        this._changes.removed.push(toDiffEntry(entryPath, entryA));
      } else if (entryA.kind !== entryB.kind) {
        this._changes.removed.push(toDiffEntry(entryPath, entryA));
        this._changes.added.push(toDiffEntry(entryPath, entryB));
      } else if (entryA.hash === entryB.hash) {
        if (entryA.mode !== entryB.mode && (this._options.modeChanges ?? 'modified') === 'modified') {
          this._pushModified(entryPath, entryA, entryB);
        }
      } else if (entryA.kind === Kind.tree) {
        subtrees.push(this.diff(entryPath, entryA.hash, entryB.hash));
      } else {
        this._pushModified(entryPath, entryA, entryB);
      }
    }

    for (const entryB of byNameB.values()) {
      this._changes.added.push(toDiffEntry(joinPath(path, entryB.name), entryB));
    }

    await Promise.all(subtrees);
  }

  private _pushModified(path: string, a: TreeEntry, b: TreeEntry) {
    this._changes.modified.push({
      path,
      kind: a.kind,
      oldMode: a.mode,
      newMode: b.mode,
      oldHash: a.hash,
      newHash: b.hash,
    });
  }

  private async _loadTree(path: string, hash: Hash): Promise<readonly TreeEntry[] | undefined> {
    try {
      const raw = await this._store.get(hash);
      if (this._options.verifyObjects) {
        const actual = this._store.hasher.digest(raw.kind, raw.body);
        if (actual !== hash) {
          throw createHashMismatchError(hash, actual);
        }
      }

      const object = decodeObjectAndWrapErrors(raw, hash, this._store.hasher);
      if (object.kind !== Kind.tree) {
        throw createObjectKindMismatchError(hash, Kind.tree, object.kind);
      }

      return object.body;
    } catch (error) {
      if (!isCairnError(error, CairnErrno.ObjectNotFound, CairnErrno.HashMismatch, CairnErrno.MalformedEncoding, CairnErrno.ObjectKindMismatch)) {
        throw error;
      }

      this._changes.problems.push({ path, hash, errno: error.errno, message: errorToString(error) });
      return undefined;
    }
  }
}

function toDiffEntry(path: string, entry: TreeEntry): DiffEntry {
  return { path, kind: entry.kind, mode: entry.mode, hash: entry.hash };
}

function byPath(a: { path: string }, b: { path: string }): number {
  return compareBytewise(a.path, b.path);
}
