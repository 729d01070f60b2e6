import { Errno, FSError } from '../model/FSError';
import { compareListEntries, ISimpleFS, ListEntry, ListOptions, WriteOptions } from '../model/ISimpleFS';
import { Path } from '../model/Path';

interface FileEntry {
  kind: 'file';
  path: Path;
  content: Uint8Array;
  executable: boolean;
}
interface DirectoryEntry {
  kind: 'dir';
  path: Path;
}
type Entry = FileEntry | DirectoryEntry;

/**
 * Map-backed filesystem. Contents are copied on the way in and out,
 * so callers can never mutate what is stored.
 */
export class InMemoryFS implements ISimpleFS {
  private readonly _store = new Map<string, Entry>();

  async fileExists(path: Path): Promise<boolean> {
    return this._store.get(path.value)?.kind === 'file';
  }

  async directoryExists(path: Path): Promise<boolean> {
    return path.isRoot || this._store.get(path.value)?.kind === 'dir';
  }

  async read(path: Path): Promise<Uint8Array> {
    return this._getFile(path).content.slice();
  }

  async write(path: Path, data: Uint8Array, options?: WriteOptions): Promise<void> {
    if (path.isRoot) {
      throw new FSError(Errno.EISDIR, path.value);
    }

    const existing = this._store.get(path.value);
    if (existing !== undefined && existing.kind === 'dir') {
      throw new FSError(Errno.EISDIR, path.value);
    }

    this._ensureParentExists(path);
    this._store.set(path.value, {
      kind: 'file',
      path,
      content: data.slice(),
      executable: options?.executable ?? false,
    });
  }

  async deleteFile(path: Path): Promise<void> {
    this._getFile(path);
    this._store.delete(path.value);
  }

  async createDirectory(path: Path): Promise<void> {
    if (path.isRoot) {
      return;
    }

    const entry = this._store.get(path.value);
    if (entry !== undefined) {
      if (entry.kind === 'dir') {
        return;
      }

      throw new FSError(Errno.EEXIST, path.value);
    }

    this._ensureParentExists(path);
    this._store.set(path.value, { kind: 'dir', path });
  }

  async deleteDirectory(path: Path): Promise<void> {
    this._getDirectory(path);

    for (const key of [...this._store.keys()]) {
      const entry = this._store.get(key);
      if (entry !== undefined && entry.path.startsWith(path)) {
        this._store.delete(key);
      }
    }
  }

  async list(path: Path, options?: ListOptions): Promise<ListEntry[]> {
    this._getDirectory(path);

    const recursive = options?.recursive ?? false;
    const results: ListEntry[] = [];
    for (const entry of this._store.values()) {
      const isMatch = recursive ? path.isParentOf(entry.path) : path.isImmediateParentOf(entry.path);
      if (!isMatch) {
        continue;
      }

      if (entry.kind === 'file') {
        results.push({ kind: 'file', path: entry.path, isExecutable: entry.executable });
      } else {
        results.push({ kind: 'dir', path: entry.path });
      }
    }

    return results.sort(compareListEntries);
  }

  private _getFile(path: Path): FileEntry {
    const entry = this._store.get(path.value);
    if (entry === undefined) {
      throw new FSError(Errno.ENOENT, path.value);
    }
    if (entry.kind !== 'file') {
      throw new FSError(Errno.EISDIR, path.value);
    }

    return entry;
  }

  private _getDirectory(path: Path): void {
    if (path.isRoot) {
      return;
    }

    const entry = this._store.get(path.value);
    if (entry === undefined) {
      throw new FSError(Errno.ENOENT, path.value);
    }
    if (entry.kind !== 'dir') {
      throw new FSError(Errno.ENOTDIR, path.value);
    }
  }

  private _ensureParentExists(path: Path) {
    const segments = path.segments;
    for (let i = 1; i < segments.length; i++) {
      const parentPath = new Path(segments.slice(0, i).join('/'));
      const entry = this._store.get(parentPath.value);
      if (entry === undefined) {
        this._store.set(parentPath.value, { kind: 'dir', path: parentPath });
      } else if (entry.kind !== 'dir') {
        throw new FSError(Errno.ENOTDIR, parentPath.value);
      }
    }
  }
}
