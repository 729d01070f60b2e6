import { Hasher } from '../Hasher';
import { Kind, Mode, TreeEntry } from '../model';
import { decodeCommit, decodeFrame, decodeTree } from './decodeObject';
import { encodeCommit, encodeTree, frameObject } from './encodeObject';
import { dummyPerson } from '../../__testHelpers__/dummyPerson';

const encoder = new TextEncoder();
const decoder = new TextDecoder();
const hasher = new Hasher();

const EMPTY_TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';
const BLOB_A = '2e65efe2a145dda7ee51d1741299f848e5bf752e';

describe('encodeTree', () => {
  test('single file', () => {
    const body = encodeTree([{ name: 'a.txt', mode: Mode.file, kind: Kind.blob, hash: BLOB_A }], hasher);
    expect(hasher.digest(Kind.tree, body)).toBe('1a602d9bd07ce5272ddaa64e21da12dbca2b8c9f');
  });

  test('empty sub-tree', () => {
    const body = encodeTree([{ name: 'a', mode: Mode.tree, kind: Kind.tree, hash: EMPTY_TREE }], hasher);
    expect(decoder.decode(body.subarray(0, 8))).toBe('40000 a\0');
    expect(hasher.digest(Kind.tree, body)).toBe('0a8a87dd80eda4132d290a67b0676cde6ec1cb29');
  });

  test('canonical order does not depend on input order', () => {
    const entries: TreeEntry[] = [
      { name: 'a0', mode: Mode.file, kind: Kind.blob, hash: BLOB_A },
      { name: 'a', mode: Mode.tree, kind: Kind.tree, hash: EMPTY_TREE },
      { name: 'a.b', mode: Mode.exec, kind: Kind.blob, hash: BLOB_A },
    ];
    const forward = encodeTree(entries, hasher);
    const backward = encodeTree([...entries].reverse(), hasher);
    expect(backward).toEqual(forward);

    // Trees sort as if their name ended in '/'
    expect(decodeTree(forward, hasher).map(e => e.name)).toEqual(['a.b', 'a', 'a0']);
  });

  test('round trip', () => {
    const entries: TreeEntry[] = [
      { name: 'link', mode: Mode.symlink, kind: Kind.blob, hash: BLOB_A },
      { name: 'run.sh', mode: Mode.exec, kind: Kind.blob, hash: BLOB_A },
      { name: 'src', mode: Mode.tree, kind: Kind.tree, hash: EMPTY_TREE },
    ];
    expect(decodeTree(encodeTree(entries, hasher), hasher)).toEqual(entries);
  });

  test.each<[string, TreeEntry[], string]>([
    ['duplicate names', [
      { name: 'x', mode: Mode.file, kind: Kind.blob, hash: BLOB_A },
      { name: 'x', mode: Mode.exec, kind: Kind.blob, hash: BLOB_A },
    ], "Duplicate entry name 'x'"],
    ['a blob and a tree of the same name sorted apart', [
      { name: 'a', mode: Mode.file, kind: Kind.blob, hash: BLOB_A },
      { name: 'a.txt', mode: Mode.file, kind: Kind.blob, hash: BLOB_A },
      { name: 'a', mode: Mode.tree, kind: Kind.tree, hash: EMPTY_TREE },
    ], "Duplicate entry name 'a'"],
    ['slash in name', [{ name: 'a/b', mode: Mode.file, kind: Kind.blob, hash: BLOB_A }], "Invalid entry name 'a/b'"],
    ['empty name', [{ name: '', mode: Mode.file, kind: Kind.blob, hash: BLOB_A }], "Invalid entry name ''"],
    ['mode and kind disagree', [{ name: 'x', mode: Mode.tree, kind: Kind.blob, hash: EMPTY_TREE }], 'does not describe a blob'],
    ['bad hash', [{ name: 'x', mode: Mode.file, kind: Kind.blob, hash: 'abc' }], "Invalid hash 'abc'"],
  ])('rejects %s', (_: string, entries: TreeEntry[], message: string) => {
    expect(() => encodeTree(entries, hasher)).toThrow(message);
  });
});

describe('decodeTree', () => {
  function rawEntry(header: string, hash: string): Uint8Array[] {
    return [encoder.encode(header), Uint8Array.from(Buffer.from(hash, 'hex'))];
  }

  function join(parts: Uint8Array[]): Uint8Array {
    return Uint8Array.from(Buffer.concat(parts));
  }

  test('empty body', () => {
    expect(decodeTree(new Uint8Array(), hasher)).toEqual([]);
  });

  test.each<[string, Uint8Array, string]>([
    ['out of order', join([...rawEntry('100644 b\0', BLOB_A), ...rawEntry('100644 a\0', BLOB_A)]), "Entry 'a' is out of order"],
    ['duplicate', join([...rawEntry('100644 a\0', BLOB_A), ...rawEntry('100755 a\0', BLOB_A)]), "Duplicate entry name 'a'"],
    ['duplicate sorted apart', join([
      ...rawEntry('100644 a\0', BLOB_A),
      ...rawEntry('100644 a.txt\0', BLOB_A),
      ...rawEntry('40000 a\0', EMPTY_TREE),
    ]), "Duplicate entry name 'a'"],
    ['leading zero in mode', join(rawEntry('040000 a\0', EMPTY_TREE)), 'Invalid octal number'],
    ['unknown mode', join(rawEntry('100600 a\0', BLOB_A)), 'Unsupported mode 100600'],
    ['truncated hash', encoder.encode('100644 a\0abc'), "Truncated hash for entry 'a'"],
    ['missing NUL', encoder.encode('100644 a'), 'Missing NUL after name'],
  ])('rejects %s', (_: string, body: Uint8Array, message: string) => {
    expect(() => decodeTree(body, hasher)).toThrow(message);
  });
});

describe('commits', () => {
  test('encodes git commit layout', () => {
    const body = encodeCommit({
      tree: EMPTY_TREE,
      parents: [],
      author: dummyPerson(),
      committer: dummyPerson(),
      message: 'Initial commit',
    }, hasher);

    expect(decoder.decode(body)).toBe([
      `tree ${EMPTY_TREE}`,
      'author Test Name <test@example.com> 2272247100 -0300',
      'committer Test Name <test@example.com> 2272247100 -0300',
      '',
      'Initial commit',
    ].join('\n'));
    expect(hasher.digest(Kind.commit, body)).toBe('eaef5b6f452335fad4dd280a113d81e82a3acaca');
  });

  test('round trip with parents and multi-line message', () => {
    const commit = {
      tree: EMPTY_TREE,
      parents: ['eaef5b6f452335fad4dd280a113d81e82a3acaca', BLOB_A],
      author: dummyPerson(),
      committer: dummyPerson(60),
      message: 'Subject\n\nBody line\n',
    };
    expect(decodeCommit(encodeCommit(commit, hasher), hasher)).toEqual(commit);
  });

  test.each<[string, string, string]>([
    ['no tree', 'author Test Name <test@example.com> 2272247100 -0300\ncommitter Test Name <test@example.com> 2272247100 -0300\n\nm', "Unexpected header 'author'"],
    ['no committer', `tree ${EMPTY_TREE}\nauthor Test Name <test@example.com> 2272247100 -0300\n\nm`, 'Incomplete commit headers'],
    ['no blank line', `tree ${EMPTY_TREE}\n`, 'Missing blank line before message'],
    ['bad tree hash', 'tree xyz\n\n', "Invalid hash 'xyz'"],
  ])('rejects %s', (_: string, text: string, message: string) => {
    expect(() => decodeCommit(encoder.encode(text), hasher)).toThrow(message);
  });
});

describe('decodeFrame', () => {
  test('round trip with empty body', () => {
    expect(decodeFrame(frameObject(Kind.blob, new Uint8Array()))).toEqual({ kind: Kind.blob, body: new Uint8Array() });
  });

  test.each<[string, string]>([
    ['blob 3\0ab', 'Invalid body length, header says 3 but found 2'],
    ['blob 03\0abc', 'Invalid decimal number'],
    ['tag 1\0a', "Unknown object kind 'tag'"],
    ['blob', 'Missing space in object header'],
    ['blob 1', 'Missing NUL in object header'],
  ])('rejects %p', (text: string, message: string) => {
    expect(() => decodeFrame(encoder.encode(text))).toThrow(message);
  });
});
