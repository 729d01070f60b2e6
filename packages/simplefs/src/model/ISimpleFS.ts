import { Path } from './Path';

/**
 * The smallest filesystem surface the object store and the tree sources need.
 * Implementations must make `write` atomic from a reader's point of view:
 * a concurrent `read` sees either the previous content or the complete new content.
 */
export interface ISimpleFS {
  fileExists(path: Path): Promise<boolean>;
  read(path: Path): Promise<Uint8Array>;
  write(path: Path, data: Uint8Array): Promise<void>;
  deleteFile(path: Path): Promise<void>;

  directoryExists(path: Path): Promise<boolean>;
  list(path: Path, options?: ListOptions): Promise<ListEntry[]>;
  createDirectory(path: Path): Promise<void>;
  deleteDirectory(path: Path): Promise<void>;
}

export interface ListOptions {
  recursive?: boolean;
}

export interface ListEntry {
  path: Path;
  kind: 'file' | 'dir';
  /**
   * Only reported for files, and only by backends that track permissions.
   */
  isExecutable?: boolean;
}

export interface WriteOptions {
  executable?: boolean;
}

export function compareListEntries(a: ListEntry, b: ListEntry): number {
  return a.path.value < b.path.value ? -1 : a.path.value > b.path.value ? 1 : 0;
}
