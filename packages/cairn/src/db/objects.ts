import { decodeCommit, decodeTree } from './encoding/decodeObject';
import { encodeCommit, encodeTree } from './encoding/encodeObject';
import { CommitBody, Hash, Kind, RawObject, TreeEntry } from './model';
import type { Hasher } from './Hasher';
import type { IObjectStore } from './ObjectStore';
import { CairnErrno, CairnError, createObjectKindMismatchError } from './errors';
import { errorToString } from './util';

export type BlobObject = {
  readonly kind: Kind.blob;
  readonly body: Uint8Array;
};

export type TreeObject = {
  readonly kind: Kind.tree;
  readonly body: readonly TreeEntry[];
};

export type CommitObject = {
  readonly kind: Kind.commit;
  readonly body: CommitBody;
};

export type CairnObject = BlobObject | TreeObject | CommitObject;

export function encodeBody(object: CairnObject, hasher: Hasher): Uint8Array {
  switch (object.kind) {
    case Kind.blob:
      return object.body;
    case Kind.tree:
      return encodeTree(object.body, hasher);
    case Kind.commit:
      return encodeCommit(object.body, hasher);
  }
}

export function decodeBody(raw: RawObject, hasher: Hasher): CairnObject {
  switch (raw.kind) {
    case Kind.blob:
      return { kind: Kind.blob, body: raw.body };
    case Kind.tree:
      return { kind: Kind.tree, body: decodeTree(raw.body, hasher) };
    case Kind.commit:
      return { kind: Kind.commit, body: decodeCommit(raw.body, hasher) };
  }
}

/**
 * Like `decodeBody`, reporting failures as `MalformedEncoding` of the given object.
 */
export function decodeObjectAndWrapErrors(raw: RawObject, hash: Hash, hasher: Hasher): CairnObject {
  try {
    return decodeBody(raw, hasher);
  } catch (error) {
    throw new CairnError(CairnErrno.MalformedEncoding, `Invalid ${raw.kind}: ${errorToString(error)}`).withObjectId(hash);
  }
}

export async function saveObject(store: IObjectStore, object: CairnObject): Promise<Hash> {
  return await store.put(object.kind, encodeBody(object, store.hasher));
}

export async function loadObject(store: IObjectStore, hash: Hash): Promise<CairnObject> {
  const raw = await store.get(hash);
  return decodeObjectAndWrapErrors(raw, hash, store.hasher);
}

export async function loadBlobObject(store: IObjectStore, hash: Hash): Promise<BlobObject> {
  const object = await loadObject(store, hash);
  if (object.kind !== Kind.blob) {
    throw createObjectKindMismatchError(hash, Kind.blob, object.kind);
  }

  return object;
}

export async function loadTreeObject(store: IObjectStore, hash: Hash): Promise<TreeObject> {
  const object = await loadObject(store, hash);
  if (object.kind !== Kind.tree) {
    throw createObjectKindMismatchError(hash, Kind.tree, object.kind);
  }

  return object;
}

export async function loadCommitObject(store: IObjectStore, hash: Hash): Promise<CommitObject> {
  const object = await loadObject(store, hash);
  if (object.kind !== Kind.commit) {
    throw createObjectKindMismatchError(hash, Kind.commit, object.kind);
  }

  return object;
}
