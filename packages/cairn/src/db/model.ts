export enum Mode {
  tree = 0o040000,
  file = 0o100644,
  exec = 0o100755,
  symlink = 0o120000,
}

export enum Kind {
  blob = 'blob',
  tree = 'tree',
  commit = 'commit',
}

/**
 * Kinds that may be referenced from a tree entry.
 */
export type EntryKind = Kind.blob | Kind.tree;

/**
 * Lowercase hex digest of an object's framed encoding.
 */
export type Hash = string;

export type ObjectFormat = 'sha1' | 'sha256';

export type SecondsWithOffset = {
  readonly seconds: number;
  /**
   * Minutes behind UTC, same convention as `Date.prototype.getTimezoneOffset` (UTC-03:00 is `180`).
   */
  readonly offset: number;
};

export type Person = {
  readonly name: string;
  readonly email: string;
  readonly date: SecondsWithOffset;
};

export type TreeEntry = {
  readonly name: string;
  readonly mode: Mode;
  readonly kind: EntryKind;
  readonly hash: Hash;
};

export type CommitBody = {
  readonly tree: Hash;
  readonly parents: readonly Hash[];
  readonly author: Person;
  readonly committer: Person;
  readonly message: string;
};

/**
 * An object as persisted: its kind and its body bytes, without the header.
 */
export type RawObject = {
  readonly kind: Kind;
  readonly body: Uint8Array;
};
