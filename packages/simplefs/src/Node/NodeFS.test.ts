import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { NodeFS } from './NodeFS';
import { Path } from '../model/Path';
import { ListEntry } from '../model/ISimpleFS';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe('NodeFS', () => {
  let basePath: string;
  let sut: NodeFS;

  beforeEach(async () => {
    basePath = await fs.mkdtemp(path.join(os.tmpdir(), 'simplefs-'));
    sut = new NodeFS(basePath);
  });
  afterEach(async () => {
    await fs.rm(basePath, { recursive: true, force: true });
  });

  test('fileExists', async () => {
    expect(await sut.fileExists(new Path('a.txt'))).toBe(false);
    await sut.write(new Path('a.txt'), new Uint8Array());
    expect(await sut.fileExists(new Path('a.txt'))).toBe(true);
    await sut.createDirectory(new Path('dir'));
    expect(await sut.fileExists(new Path('dir'))).toBe(false);
  });

  test('directoryExists', async () => {
    expect(await sut.directoryExists(new Path('dir'))).toBe(false);
    await sut.createDirectory(new Path('dir'));
    expect(await sut.directoryExists(new Path('dir'))).toBe(true);
    expect(await sut.directoryExists(new Path(''))).toBe(true);
  });

  test('read_write', async () => {
    const path = new Path('nested/deeper/a.txt');
    await sut.write(path, encoder.encode('some \0contents'));
    expect(decoder.decode(await sut.read(path))).toBe('some \0contents');
  });

  test('write replaces content and leaves no temp files', async () => {
    const path = new Path('dir/a.txt');
    await sut.write(path, encoder.encode('first'));
    await sut.write(path, encoder.encode('second'));
    expect(decoder.decode(await sut.read(path))).toBe('second');
    expect(await fs.readdir(`${basePath}/dir`)).toEqual(['a.txt']);
  });

  test('read_nonExistent', async () => {
    await expect(sut.read(new Path('aaa.txt'))).rejects.toThrow(/ENOENT/);
  });

  test('read_dir', async () => {
    await sut.createDirectory(new Path('dir'));
    await expect(sut.read(new Path('dir'))).rejects.toThrow(/EISDIR/);
  });

  test('deleteFile', async () => {
    const path = new Path('a.txt');
    await sut.write(path, new Uint8Array());
    await sut.deleteFile(path);
    expect(await sut.fileExists(path)).toBe(false);
    await expect(sut.deleteFile(path)).rejects.toThrow(/ENOENT/);
  });

  test('deleteDirectory', async () => {
    await sut.createDirectory(new Path('dir/nested'));
    await sut.deleteDirectory(new Path('dir'));
    expect(await sut.directoryExists(new Path('dir'))).toBe(false);
  });

  test('deleteDirectory_file', async () => {
    await sut.write(new Path('a.txt'), new Uint8Array());
    await expect(sut.deleteDirectory(new Path('a.txt'))).rejects.toThrow(/ENOTDIR/);
    expect(await sut.fileExists(new Path('a.txt'))).toBe(true);
  });

  test('list', async () => {
    await sut.write(new Path('dir/a.txt'), new Uint8Array());
    await sut.write(new Path('dir/run.sh'), new Uint8Array(), { executable: true });
    await sut.createDirectory(new Path('dir/nested'));
    expect(await sut.list(new Path('dir'))).toEqual<ListEntry[]>([
      { path: new Path('dir/a.txt'), kind: 'file', isExecutable: false },
      { path: new Path('dir/nested'), kind: 'dir' },
      { path: new Path('dir/run.sh'), kind: 'file', isExecutable: true },
    ]);
  });

  test('list_recursive', async () => {
    await sut.write(new Path('dir/nested/a.txt'), new Uint8Array());
    expect(await sut.list(new Path('dir'), { recursive: true })).toEqual<ListEntry[]>([
      { path: new Path('dir/nested'), kind: 'dir' },
      { path: new Path('dir/nested/a.txt'), kind: 'file', isExecutable: false },
    ]);
  });

  test('list_nonExistent', async () => {
    await expect(sut.list(new Path('dir'))).rejects.toThrow(/ENOENT/);
  });
});
