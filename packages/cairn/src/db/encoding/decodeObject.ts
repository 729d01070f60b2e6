import type { Hasher } from '../Hasher';
import { CommitBody, Hash, RawObject, TreeEntry } from '../model';
import { isKind, isMode, isValidEntryName, kindOfMode, treeEntryComparer } from '../util';
import { decodePerson } from './person';
import { decode, fromDec, fromOct, NEWLINE, NUL, SPACE, unpackHash } from './util';

/**
 * Splits a framed object into kind and body, checking the declared length.
 */
export function decodeFrame(raw: Uint8Array): RawObject {
  const space = raw.indexOf(SPACE);
  if (space < 0) throw new SyntaxError('Missing space in object header');
  const nul = raw.indexOf(NUL, space);
  if (nul < 0) throw new SyntaxError('Missing NUL in object header');

  const kind = decode(raw, 0, space);
  if (!isKind(kind)) throw new SyntaxError(`Unknown object kind '${kind}'`);

  const body = raw.subarray(nul + 1);
  const size = fromDec(raw, space + 1, nul);
  if (size !== body.length) throw new SyntaxError(`Invalid body length, header says ${size} but found ${body.length}`);

  return { kind, body };
}

/**
 * Decodes a tree body. Entries must already be in canonical order and names must be unique,
 * anything else is not a canonical encoding.
 */
export function decodeTree(body: Uint8Array, hasher: Hasher): TreeEntry[] {
  const entries: TreeEntry[] = [];
  const names = new Set<string>();
  let i = 0;
  while (i < body.length) {
    const modeEnd = body.indexOf(SPACE, i);
    if (modeEnd < 0) throw new SyntaxError('Missing space after mode');
    const mode = fromOct(body, i, modeEnd);
    if (!isMode(mode)) throw new SyntaxError(`Unsupported mode ${mode.toString(8)}`);

    const nameEnd = body.indexOf(NUL, modeEnd + 1);
    if (nameEnd < 0) throw new SyntaxError('Missing NUL after name');
    const name = decode(body, modeEnd + 1, nameEnd);
    if (!isValidEntryName(name)) throw new SyntaxError(`Invalid entry name '${name}'`);

    const hashEnd = nameEnd + 1 + hasher.byteLength;
    if (hashEnd > body.length) throw new SyntaxError(`Truncated hash for entry '${name}'`);
    const hash = unpackHash(body, nameEnd + 1, hashEnd);

    const entry: TreeEntry = { name, mode, kind: kindOfMode(mode), hash };
    if (names.has(name)) throw new SyntaxError(`Duplicate entry name '${name}'`);
    const previous = entries[entries.length - 1];
    if (previous !== undefined && treeEntryComparer(previous, entry) > 0) throw new SyntaxError(`Entry '${name}' is out of order`);

    names.add(name);
    entries.push(entry);
    i = hashEnd;
  }

  return entries;
}

type Writeable<T> = { -readonly [P in keyof T]: T[P] };

/**
 * Decodes a commit body. Headers must come in the order they are written:
 * `tree`, any number of `parent`, `author`, `committer`, then a blank line and the message.
 */
export function decodeCommit(body: Uint8Array, hasher: Hasher): CommitBody {
  const parents: Hash[] = [];
  const headers: [key: string, value: string][] = [];
  let i = 0;
  while (true) {
    if (i >= body.length) throw new SyntaxError('Missing blank line before message');
    if (body[i] === NEWLINE) break;

    const keyEnd = body.indexOf(SPACE, i);
    const lineEnd = body.indexOf(NEWLINE, i);
    if (lineEnd < 0) throw new SyntaxError('Missing linefeed');
    if (keyEnd < 0 || keyEnd > lineEnd) throw new SyntaxError('Missing space in header line');

    headers.push([decode(body, i, keyEnd), decode(body, keyEnd + 1, lineEnd)]);
    i = lineEnd + 1;
  }

  const commit: Partial<Writeable<CommitBody>> = { parents };
  let stage = 0;
  for (const [key, value] of headers) {
    if (key === 'tree' && stage === 0) {
      commit.tree = expectHash(value, hasher);
      stage = 1;
    } else if (key === 'parent' && stage === 1) {
      parents.push(expectHash(value, hasher));
    } else if (key === 'author' && stage === 1) {
      commit.author = decodePerson(value);
      stage = 2;
    } else if (key === 'committer' && stage === 2) {
      commit.committer = decodePerson(value);
      stage = 3;
    } else {
      throw new SyntaxError(`Unexpected header '${key}'`);
    }
  }

  const { tree, author, committer } = commit;
  if (tree === undefined || author === undefined || committer === undefined) {
    throw new SyntaxError('Incomplete commit headers');
  }

  return {
    tree,
    parents,
    author,
    committer,
    message: decode(body, i + 1),
  };
}

function expectHash(value: string, hasher: Hasher): Hash {
  if (!hasher.isValidHash(value)) {
    throw new SyntaxError(`Invalid hash '${value}'`);
  }

  return value;
}
