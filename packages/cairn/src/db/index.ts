export { Mode, Kind } from './model';
export type { EntryKind, Hash, ObjectFormat, Person, SecondsWithOffset, TreeEntry, CommitBody, RawObject } from './model';

export { Hasher, isObjectFormat } from './Hasher';
export { ObjectStore, InitMode, computeObjectPath } from './ObjectStore';
export type { IObjectStore, StoreOptions } from './ObjectStore';
export { StoreConfig, describeConfig, isCompressionLevel } from './config';
export type { CompressionLevel } from './config';

export {
  encodeBody,
  decodeBody,
  loadObject,
  loadBlobObject,
  loadTreeObject,
  loadCommitObject,
  saveObject,
} from './objects';
export type { CairnObject, BlobObject, TreeObject, CommitObject } from './objects';

export { createCommit, makeCommit } from './commits';
export { walkCommits, walkTree, listFiles } from './walkers';
export type { HashAndCommitBody, TreeWalkEntry } from './walkers';

export { CairnError, CairnErrno, isCairnError } from './errors';
export { decodePerson, encodePerson, now } from './encoding/person';
