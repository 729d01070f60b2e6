import { Path } from './Path';

describe('Path', () => {
  test.each(['', '/'])("'%p' is the root", (input: string) => {
    const path = new Path(input);
    expect(path.value).toBe('');
    expect(path.segments).toEqual([]);
    expect(path.isRoot).toBe(true);
  });

  test.each(['ab c/d', '/ab c/d', 'ab c/d/'])("two segments '%p'", (input: string) => {
    const path = new Path(input);
    expect(path.value).toBe('ab c/d');
    expect(path.segments).toEqual(['ab c', 'd']);
    expect(path.numSegments).toBe(2);
    expect(path.leafName).toBe('d');
  });

  test('accepts non-ascii segments', () => {
    expect(new Path('docs/résumé.md').leafName).toBe('résumé.md');
  });

  test.each(['//', '///', '/a//b', '/a\\b/c', 'a/b\tc/d', 'a/../b', '.'])("rejects '%p'", (input: string) => {
    expect(() => new Path(input)).toThrow();
  });

  test.each([
    ['a/b/c', 'a/b/c/d', true],
    ['a/b/c', 'a/b/c', false],
    ['a/b/c', 'a/b', false],
    ['a/b/c', 'a/c/c/d', false],
    ['', 'a/b', true],
    ['', '', false],
  ])("'%p' isParentOf '%p' should be %p", (a: string, b: string, expected: boolean) => {
    expect(new Path(a).isParentOf(new Path(b))).toBe(expected);
  });

  test.each([
    ['a/b/c', 'a/b/c/d/e', false],
    ['a/b/c', 'a/b/c/d', true],
    ['', 'a', true],
    ['', 'a/b', false],
  ])("'%p' isImmediateParentOf '%p' should be %p", (a: string, b: string, expected: boolean) => {
    expect(new Path(a).isImmediateParentOf(new Path(b))).toBe(expected);
  });

  test.each([
    ['a', ''],
    ['a/bcd/ef', 'a/bcd'],
  ])("'%p'.getParent() should be '%p'", (path: string, expected: string) => {
    expect(new Path(path).getParent().value).toBe(expected);
  });

  test('root has no parent or leaf name', () => {
    const root = new Path('');
    expect(() => root.getParent()).toThrow('Unable to get parent of the root');
    expect(() => root.leafName).toThrow('Unable to get leaf name of the root');
  });

  test('child', () => {
    expect(new Path('').child('a').value).toBe('a');
    expect(new Path('a/b').child('c').value).toBe('a/b/c');
    expect(() => new Path('a').child('b/c')).toThrow("Invalid child name 'b/c'");
  });

  test('join', () => {
    expect(Path.join(new Path('a'), new Path('b/c')).value).toBe('a/b/c');
    expect(Path.join(new Path(''), new Path('b')).value).toBe('b');
    expect(Path.join(new Path('a'), new Path('')).value).toBe('a');
  });

  test('formatting', () => {
    const path = new Path('a/b');
    expect(`${path}`).toBe('"a/b"');
    expect(JSON.stringify({ path })).toBe('{"path":"a/b"}');
    expect(path.equals(new Path('/a/b/'))).toBe(true);
  });
});
