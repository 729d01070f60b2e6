import { Kind, Mode } from '../db/model';
import { DiffEntry } from './model';
import { detectRenames, levenshteinDistance } from './renames';

const H1 = '1111111111111111111111111111111111111111';
const H2 = '2222222222222222222222222222222222222222';

function blob(path: string, hash: string = H1, mode: Mode = Mode.file): DiffEntry {
  return { path, kind: Kind.blob, mode, hash };
}

describe('levenshteinDistance', () => {
  test.each<[string, string, number]>([
    ['', '', 0],
    ['abc', '', 3],
    ['', 'abc', 3],
    ['kitten', 'sitting', 3],
    ['a/x.txt', 'a/y.txt', 1],
    ['a/x.txt', 'b/y.txt', 2],
    ['same', 'same', 0],
  ])('%p -> %p is %p', (a: string, b: string, expected: number) => {
    expect(levenshteinDistance(a, b)).toBe(expected);
    expect(levenshteinDistance(b, a)).toBe(expected);
  });
});

describe('detectRenames', () => {
  test('pairs identical content', () => {
    const result = detectRenames([blob('old.txt')], [blob('new.txt', H1, Mode.exec)]);
    expect(result).toEqual({
      added: [],
      removed: [],
      renamed: [{ oldPath: 'old.txt', newPath: 'new.txt', kind: Kind.blob, oldMode: Mode.file, newMode: Mode.exec, hash: H1 }],
    });
  });

  test('different content is not a rename', () => {
    const result = detectRenames([blob('old.txt', H1)], [blob('new.txt', H2)]);
    expect(result.renamed).toEqual([]);
    expect(result.added.map(e => e.path)).toEqual(['new.txt']);
    expect(result.removed.map(e => e.path)).toEqual(['old.txt']);
  });

  test('blobs and trees never pair', () => {
    const tree: DiffEntry = { path: 'dir', kind: Kind.tree, mode: Mode.tree, hash: H1 };
    expect(detectRenames([blob('file')], [tree]).renamed).toEqual([]);
  });

  test('path-distance pairs the closest paths', () => {
    const result = detectRenames(
      [blob('a/x.txt'), blob('b/x.txt')],
      [blob('b/y.txt'), blob('a/y.txt')],
    );
    expect(result.renamed.map(r => [r.oldPath, r.newPath])).toEqual([
      ['a/x.txt', 'a/y.txt'],
      ['b/x.txt', 'b/y.txt'],
    ]);
  });

  test('path-distance breaks ties by old path, then new path', () => {
    const result = detectRenames([blob('y/a'), blob('x/a')], [blob('z/a')]);
    expect(result.renamed.map(r => [r.oldPath, r.newPath])).toEqual([['x/a', 'z/a']]);
    expect(result.removed.map(e => e.path)).toEqual(['y/a']);

    const result2 = detectRenames([blob('z/a')], [blob('y/a'), blob('x/a')]);
    expect(result2.renamed.map(r => [r.oldPath, r.newPath])).toEqual([['z/a', 'x/a']]);
    expect(result2.added.map(e => e.path)).toEqual(['y/a']);
  });

  test('unique leaves ambiguous candidates alone', () => {
    const result = detectRenames([blob('a/x.txt'), blob('b/x.txt'), blob('c', H2)], [blob('a/y.txt'), blob('b/y.txt'), blob('d', H2)], 'unique');
    expect(result.renamed.map(r => [r.oldPath, r.newPath])).toEqual([['c', 'd']]);
    expect(result.removed.map(e => e.path)).toEqual(['a/x.txt', 'b/x.txt']);
    expect(result.added.map(e => e.path)).toEqual(['a/y.txt', 'b/y.txt']);
  });
});
