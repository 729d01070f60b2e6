import { Hash, Kind, Person } from './model';
import { IObjectStore } from './ObjectStore';
import { saveObject } from './objects';
import { createObjectKindMismatchError } from './errors';

/**
 * Writes a commit for an existing tree. The tree and every parent must already be in the store,
 * which keeps history acyclic: a commit can only point at commits that existed before it.
 */
export async function createCommit(
  store: IObjectStore,
  tree: Hash,
  parents: Hash[],
  message: string,
  author: Person,
  committer: Person = author,
): Promise<Hash> {
  store.hasher.validateHash(tree, 'commit tree');
  parents.forEach(parent => store.hasher.validateHash(parent, 'commit parent'));

  await expectKind(store, tree, Kind.tree);
  for (const parent of parents) {
    await expectKind(store, parent, Kind.commit);
  }

  return await saveObject(store, {
    kind: Kind.commit,
    body: {
      tree,
      parents: [...parents],
      author,
      committer,
      message,
    },
  });
}

/**
 * `createCommit` with the committer given explicitly, in (tree, parents, author, committer, message) order.
 */
export async function makeCommit(
  store: IObjectStore,
  tree: Hash,
  parents: Hash[],
  author: Person,
  committer: Person,
  message: string,
): Promise<Hash> {
  return await createCommit(store, tree, parents, message, author, committer);
}

async function expectKind(store: IObjectStore, hash: Hash, kind: Kind): Promise<void> {
  const object = await store.get(hash);
  if (object.kind !== kind) {
    throw createObjectKindMismatchError(hash, kind, object.kind);
  }
}
