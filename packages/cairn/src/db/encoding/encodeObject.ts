import type { Hasher } from '../Hasher';
import { CairnErrno, CairnError } from '../errors';
import { CommitBody, Kind, TreeEntry } from '../model';
import { isMode, isValidEntryName, kindOfMode, treeEntryComparer } from '../util';
import { encodePerson } from './person';
import { concat, encode, packHash } from './util';

export function encodeHeader(kind: Kind, length: number): Uint8Array {
  return encode(`${kind} ${length}\0`);
}

/**
 * Prepends the `"<kind> <length>\0"` header, producing the exact bytes that are hashed and stored.
 */
export function frameObject(kind: Kind, body: Uint8Array): Uint8Array {
  return concat(encodeHeader(kind, body.length), body);
}

/**
 * Encodes tree entries canonically, whatever order they are given in.
 * Rejects anything that could not be decoded back to the same entries.
 */
export function encodeTree(entries: readonly TreeEntry[], hasher: Hasher): Uint8Array {
  const sorted = [...entries].sort(treeEntryComparer);
  const parts: Uint8Array[] = [];
  // A blob and a tree of one name need not be neighbours once sorted ('a' < 'a.txt' < 'a/')
  const names = new Set<string>();
  for (const entry of sorted) {
    validateTreeEntry(entry, hasher);
    if (names.has(entry.name)) {
      throw new CairnError(CairnErrno.InvalidTreeEntry, `Duplicate entry name '${entry.name}'`);
    }
    names.add(entry.name);

    parts.push(encode(`${entry.mode.toString(8)} ${entry.name}\0`), packHash(entry.hash));
  }

  return concat(...parts);
}

function validateTreeEntry(entry: TreeEntry, hasher: Hasher) {
  if (!isValidEntryName(entry.name)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Invalid entry name '${entry.name}'`);
  }
  if (!isMode(entry.mode)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Entry '${entry.name}' has unsupported mode ${Number(entry.mode).toString(8)}`);
  }
  if (kindOfMode(entry.mode) !== entry.kind) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Entry '${entry.name}' has mode ${entry.mode.toString(8)} which does not describe a ${entry.kind}`);
  }
  hasher.validateHash(entry.hash, `entry '${entry.name}'`);
}

export function encodeCommit(body: CommitBody, hasher: Hasher): Uint8Array {
  hasher.validateHash(body.tree, 'commit tree');
  body.parents.forEach(parent => hasher.validateHash(parent, 'commit parent'));

  const lines = [
    `tree ${body.tree}`,
    ...body.parents.map(parent => `parent ${parent}`),
    `author ${encodePerson(body.author)}`,
    `committer ${encodePerson(body.committer)}`,
    '',
    body.message,
  ];
  return encode(lines.join('\n'));
}
