import { FileStorage } from '@flystorage/file-storage';

import { Errno, FSError } from '../model/FSError';
import { compareListEntries, ISimpleFS, ListEntry, ListOptions } from '../model/ISimpleFS';
import { Path } from '../model/Path';

/**
 * Adapts a flystorage `FileStorage` (local disk, S3, GCS, in-memory, ...) to `ISimpleFS`.
 * Permissions are not tracked, so files are never reported as executable.
 */
export class FlystorageFS implements ISimpleFS {
  constructor(private readonly _storage: FileStorage) { }

  async fileExists(path: Path): Promise<boolean> {
    return await this._storage.fileExists(path.value);
  }

  async directoryExists(path: Path): Promise<boolean> {
    return path.isRoot || await this._storage.directoryExists(path.value);
  }

  async read(path: Path): Promise<Uint8Array> {
    if (!(await this._storage.fileExists(path.value))) {
      throw new FSError(await this._storage.directoryExists(path.value) ? Errno.EISDIR : Errno.ENOENT, path.value);
    }

    try {
      return await this._storage.readToUint8Array(path.value);
    } catch (error) {
      throw new FSError(Errno.EIO, path.value, `flystorage error: ${error}`);
    }
  }

  async write(path: Path, data: Uint8Array): Promise<void> {
    try {
      await this._storage.write(path.value, data);
    } catch (error) {
      throw new FSError(Errno.EIO, path.value, `flystorage error: ${error}`);
    }
  }

  async deleteFile(path: Path): Promise<void> {
    if (!(await this._storage.fileExists(path.value))) {
      throw new FSError(Errno.ENOENT, path.value);
    }

    await this._storage.deleteFile(path.value);
  }

  async createDirectory(path: Path): Promise<void> {
    if (!path.isRoot) {
      await this._storage.createDirectory(path.value);
    }
  }

  async deleteDirectory(path: Path): Promise<void> {
    if (await this._storage.fileExists(path.value)) {
      throw new FSError(Errno.ENOTDIR, path.value);
    }

    await this._storage.deleteDirectory(path.value);
  }

  async list(path: Path, options?: ListOptions): Promise<ListEntry[]> {
    const results: ListEntry[] = [];
    for await (const item of this._storage.list(path.value, { deep: options?.recursive ?? false })) {
      const entryPath = new Path(item.path);
      if (!path.isParentOf(entryPath)) {
        continue;
      }

      results.push(item.type === 'file' ? { kind: 'file', path: entryPath } : { kind: 'dir', path: entryPath });
    }

    return results.sort(compareListEntries);
  }
}
