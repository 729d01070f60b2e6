import fs from 'fs/promises';
import path from 'path';

import { Errno, FSError } from '../model/FSError';
import { compareListEntries, ISimpleFS, ListEntry, ListOptions, WriteOptions } from '../model/ISimpleFS';
import { Path } from '../model/Path';

let tempCounter = 0;

export class NodeFS implements ISimpleFS {
  private readonly _basePath: string;

  get physicalRoot(): string {
    return path.resolve(this._basePath);
  }

  constructor(basePath: string) {
    this._basePath = path.resolve(basePath);
  }

  async fileExists(path: Path): Promise<boolean> {
    const physicalPath = this._toPhysical(path);
    try {
      return (await fs.stat(physicalPath)).isFile();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }

      throw wrapFsError(error, physicalPath);
    }
  }

  async directoryExists(path: Path): Promise<boolean> {
    const physicalPath = this._toPhysical(path);
    try {
      return (await fs.stat(physicalPath)).isDirectory();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }

      throw wrapFsError(error, physicalPath);
    }
  }

  async read(path: Path): Promise<Uint8Array> {
    const physicalPath = this._toPhysical(path);
    try {
      const data = await fs.readFile(physicalPath);
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    } catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  /**
   * Writes to a sibling temp file first and renames it into place,
   * so readers never see a partially written file.
   */
  async write(path: Path, data: Uint8Array, options?: WriteOptions): Promise<void> {
    if (path.isRoot) {
      throw new FSError(Errno.EISDIR, this._basePath);
    }

    const physicalPath = this._toPhysical(path);
    const tempPath = this._toPhysical(path.getParent().child(`.tmp-${path.leafName}-${process.pid}-${tempCounter++}`));
    try {
      await fs.mkdir(this._toPhysical(path.getParent()), { recursive: true });
      await fs.writeFile(tempPath, data, { mode: options?.executable ? 0o755 : 0o644 });
      await fs.rename(tempPath, physicalPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw wrapFsError(error, physicalPath);
    }
  }

  async deleteFile(path: Path): Promise<void> {
    const physicalPath = this._toPhysical(path);
    try {
      await fs.unlink(physicalPath);
    } catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async deleteDirectory(path: Path): Promise<void> {
    const physicalPath = this._toPhysical(path);
    // fs.rm would happily delete a file as well
    if (await this.fileExists(path)) {
      throw new FSError(Errno.ENOTDIR, physicalPath, 'Found a file, expected a directory');
    }

    try {
      await fs.rm(physicalPath, { recursive: true });
    } catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async createDirectory(path: Path): Promise<void> {
    const physicalPath = this._toPhysical(path);
    try {
      await fs.mkdir(physicalPath, { recursive: true });
    } catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async list(path: Path, options?: ListOptions): Promise<ListEntry[]> {
    const physicalPath = this._toPhysical(path);
    try {
      const names = await fs.readdir(physicalPath, { recursive: options?.recursive ?? false });

      const result: ListEntry[] = [];
      for (const name of names) {
        const entryPath = Path.join(path, new Path(normalizeSlashes(name)));
        const stat = await fs.stat(this._toPhysical(entryPath));
        if (stat.isFile()) {
          result.push({ path: entryPath, kind: 'file', isExecutable: (stat.mode & 0o111) !== 0 });
        } else {
          result.push({ path: entryPath, kind: 'dir' });
        }
      }

      return result.sort(compareListEntries);
    } catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  private _toPhysical(p: Path): string {
    return p.isRoot ? this._basePath : path.join(this._basePath, ...p.segments);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function isErrnoName(code: string): code is keyof typeof Errno {
  return code in Errno;
}

function wrapFsError(error: unknown, physicalPath: string): FSError {
  if (error instanceof FSError) {
    return error;
  }

  if (isErrnoException(error) && error.code !== undefined && isErrnoName(error.code)) {
    return new FSError(Errno[error.code], physicalPath, `Node.js fs error: ${error}`);
  }

  return new FSError(Errno.EIO, physicalPath, `Unknown Node.js fs error: ${error}`);
}

function normalizeSlashes(relativePath: string): string {
  return path.sep === '\\' ? relativePath.replace(/\\/g, '/') : relativePath;
}
