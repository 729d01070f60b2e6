import { InMemoryFS } from './InMemoryFS';
import { Path } from '../model/Path';
import { ListEntry } from '../model/ISimpleFS';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe('InMemoryFS', () => {
  let fs: InMemoryFS;
  beforeEach(() => {
    fs = new InMemoryFS();
  });

  test('read non-existent file', async () => {
    await expect(fs.read(new Path('a/c'))).rejects.toThrow(/ENOENT/);
  });

  test('read directory', async () => {
    await fs.write(new Path('a/b/c'), new Uint8Array());
    await expect(fs.read(new Path('a/b'))).rejects.toThrow(/EISDIR/);
  });

  test('write creates parents', async () => {
    await fs.write(new Path('a/b/c'), encoder.encode('abc'));
    expect(await fs.directoryExists(new Path('a'))).toBe(true);
    expect(await fs.directoryExists(new Path('a/b'))).toBe(true);
    expect(await fs.fileExists(new Path('a/b/c'))).toBe(true);
    expect(decoder.decode(await fs.read(new Path('a/b/c')))).toBe('abc');
  });

  test('write under a file fails', async () => {
    await fs.write(new Path('a'), new Uint8Array());
    await expect(fs.write(new Path('a/b'), new Uint8Array())).rejects.toThrow(/ENOTDIR/);
  });

  test('stored content cannot be mutated by callers', async () => {
    const data = encoder.encode('abc');
    await fs.write(new Path('f'), data);
    data[0] = 0x7a;
    const read = await fs.read(new Path('f'));
    read[1] = 0x7a;
    expect(decoder.decode(await fs.read(new Path('f')))).toBe('abc');
  });

  test('createDirectory is idempotent but rejects files', async () => {
    await fs.createDirectory(new Path('d'));
    await fs.createDirectory(new Path('d'));
    await fs.write(new Path('f'), new Uint8Array());
    await expect(fs.createDirectory(new Path('f'))).rejects.toThrow(/EEXIST/);
  });

  test('deleteDirectory removes descendants', async () => {
    await fs.write(new Path('a/b/c'), new Uint8Array());
    await fs.write(new Path('ab'), new Uint8Array());
    await fs.deleteDirectory(new Path('a'));
    expect(await fs.fileExists(new Path('a/b/c'))).toBe(false);
    expect(await fs.directoryExists(new Path('a'))).toBe(false);
    expect(await fs.fileExists(new Path('ab'))).toBe(true);
  });

  test('list shallow', async () => {
    await fs.write(new Path('a/b'), new Uint8Array());
    await fs.write(new Path('a/c'), new Uint8Array(), { executable: true });
    await fs.write(new Path('b'), new Uint8Array());

    expect(await fs.list(new Path(''))).toEqual<ListEntry[]>([
      { kind: 'dir', path: new Path('a') },
      { kind: 'file', path: new Path('b'), isExecutable: false },
    ]);
    expect(await fs.list(new Path('a'))).toEqual<ListEntry[]>([
      { kind: 'file', path: new Path('a/b'), isExecutable: false },
      { kind: 'file', path: new Path('a/c'), isExecutable: true },
    ]);
  });

  test('list recursive', async () => {
    await fs.write(new Path('a/b'), new Uint8Array());
    await fs.write(new Path('b'), new Uint8Array());

    expect(await fs.list(new Path(''), { recursive: true })).toEqual<ListEntry[]>([
      { kind: 'dir', path: new Path('a') },
      { kind: 'file', path: new Path('a/b'), isExecutable: false },
      { kind: 'file', path: new Path('b'), isExecutable: false },
    ]);
  });

  test('list of a file fails', async () => {
    await fs.write(new Path('b'), new Uint8Array());
    await expect(fs.list(new Path('b'))).rejects.toThrow(/ENOTDIR/);
  });
});
