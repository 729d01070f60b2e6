import { CommitBody, EntryKind, Hash, Kind, Mode } from './model';
import { IObjectStore } from './ObjectStore';
import { loadCommitObject, loadTreeObject } from './objects';

export type HashAndCommitBody = {
  readonly hash: Hash;
  readonly commit: CommitBody;
};

export type TreeWalkEntry = {
  readonly hash: Hash;
  readonly mode: Mode;
  readonly kind: EntryKind;
  readonly path: string[];
};

/**
 * Breadth-first walk over history starting at the given commits, visiting each commit once.
 * Send `false` back into the generator to skip the parents of the commit just yielded.
 */
export async function* walkCommits(store: IObjectStore, ...heads: Hash[]): AsyncGenerator<HashAndCommitBody, void, boolean | undefined> {
  const queue = [...heads];
  const visited = new Set<Hash>(queue);
  let hash: Hash | undefined;
  while ((hash = queue.shift()) !== undefined) {
    const commit = await loadCommitObject(store, hash);
    const visitParents = yield { hash, commit: commit.body };
    if (visitParents === false) {
      continue;
    }

    for (const parent of commit.body.parents) {
      if (!visited.has(parent)) {
        visited.add(parent);
        queue.push(parent);
      }
    }
  }
}

/**
 * Depth-first walk over a tree in canonical order, yielding sub-trees before their contents.
 * Send `false` back into the generator after a tree entry to skip its contents.
 */
export async function* walkTree(store: IObjectStore, hash: Hash, parentPath: string[] = []): AsyncGenerator<TreeWalkEntry, void, boolean | undefined> {
  const tree = await loadTreeObject(store, hash);
  for (const entry of tree.body) {
    const item: TreeWalkEntry = { hash: entry.hash, mode: entry.mode, kind: entry.kind, path: [...parentPath, entry.name] };
    const descend = yield item;
    if (entry.kind === Kind.tree && descend !== false) {
      yield* walkTree(store, entry.hash, item.path);
    }
  }
}

export async function* listFiles(store: IObjectStore, hash: Hash): AsyncGenerator<TreeWalkEntry> {
  for await (const entry of walkTree(store, hash)) {
    if (entry.kind === Kind.blob) {
      yield entry;
    }
  }
}
