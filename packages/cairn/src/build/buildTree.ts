import { IObjectStore } from '../db/ObjectStore';
import { saveObject } from '../db/objects';
import { CairnErrno, CairnError, createAbortedError, createObjectNotFoundError, isCairnError } from '../db/errors';
import { Hash, Kind, Mode, TreeEntry } from '../db/model';
import { errorToString, isMode, isValidEntryName, joinPath, kindOfMode } from '../db/util';
import { Semaphore } from '../internal/Semaphore';
import { SourceEntry, TreeSource } from './TreeSource';

export interface BuildOptions {
  /**
   * Maximum number of source reads and object writes in flight. Defaults to 1 (sequential).
   */
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * Snapshots `source` into the store bottom-up and returns the digest of its root tree.
 *
 * Siblings are processed concurrently and every directory waits for all of its children before its own tree is written,
 * so the result never depends on `concurrency`. Any failure rejects the whole build without writing the trees above it.
 * Blobs and sub-trees written before the failure stay in the store.
 */
export async function buildTree<TNode>(store: IObjectStore, source: TreeSource<TNode>, options?: BuildOptions): Promise<Hash> {
  const external = options?.signal;
  if (external?.aborted) {
    throw createAbortedError();
  }

  // Stops scheduling siblings of whichever task failed first
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  external?.addEventListener('abort', onAbort);
  try {
    const builder = new TreeBuilder(store, source, new Semaphore(options?.concurrency ?? 1), controller.signal);
    return await builder.buildDirectory(source.root, '');
  } catch (error) {
    controller.abort();
    throw error;
  } finally {
    external?.removeEventListener('abort', onAbort);
  }
}

class TreeBuilder<TNode> {
  constructor(
    private readonly _store: IObjectStore,
    private readonly _source: TreeSource<TNode>,
    private readonly _semaphore: Semaphore,
    private readonly _signal: AbortSignal,
  ) { }

  async buildDirectory(node: TNode, path: string): Promise<Hash> {
    const children = await this._limited(async () => {
      try {
        return await this._source.listChildren(node);
      } catch (error) {
        throw createSourceReadError(error, path);
      }
    });

    const names = new Set<string>();
    for (const child of children) {
      validateChild(child, path, names);
    }

    const entries: TreeEntry[] = await Promise.all(children.map(child => this._buildEntry(child, joinPath(path, child.name))));
    return await this._limited(async () => {
      try {
        return await saveObject(this._store, { kind: Kind.tree, body: entries });
      } catch (error) {
        throw withPath(error, path);
      }
    });
  }

  private async _buildEntry(child: SourceEntry<TNode>, path: string): Promise<TreeEntry> {
    switch (child.kind) {
      case 'dir': {
        const hash = await this.buildDirectory(child.node, path);
        return { name: child.name, mode: Mode.tree, kind: Kind.tree, hash };
      }
      case 'leaf': {
        const mode = child.mode ?? Mode.file;
        const hash = await this._limited(async () => {
          let body: Uint8Array;
          try {
            body = await child.read();
          } catch (error) {
            throw createSourceReadError(error, path);
          }

          return await this._store.put(Kind.blob, body);
        });
        return { name: child.name, mode, kind: Kind.blob, hash };
      }
      case 'existing': {
        await this._limited(async () => {
          this._store.hasher.validateHash(child.hash, `entry '${path}'`);
          if (!(await this._store.exists(child.hash))) {
            throw createObjectNotFoundError(child.hash).withPath(path);
          }
        });
        return { name: child.name, mode: child.mode, kind: kindOfMode(child.mode), hash: child.hash };
      }
    }
  }

  private async _limited<T>(func: () => Promise<T>): Promise<T> {
    this._throwIfAborted();
    return await this._semaphore.run(async () => {
      this._throwIfAborted();
      return await func();
    });
  }

  private _throwIfAborted() {
    if (this._signal.aborted) {
      throw createAbortedError();
    }
  }
}

const leafModes: ReadonlySet<number> = new Set([Mode.file, Mode.exec, Mode.symlink]);

function validateChild<TNode>(child: SourceEntry<TNode>, parentPath: string, names: Set<string>) {
  const path = joinPath(parentPath, child.name);
  if (!isValidEntryName(child.name)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Invalid entry name '${child.name}'`).withPath(parentPath);
  }
  if (names.has(child.name)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Duplicate entry name '${child.name}'`).withPath(path);
  }
  names.add(child.name);

  if (child.kind === 'leaf' && child.mode !== undefined && !leafModes.has(child.mode)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Leaf has unsupported mode ${Number(child.mode).toString(8)}`).withPath(path);
  }
  if (child.kind === 'existing' && !isMode(child.mode)) {
    throw new CairnError(CairnErrno.InvalidTreeEntry, `Entry has unsupported mode ${Number(child.mode).toString(8)}`).withPath(path);
  }
}

function createSourceReadError(error: unknown, path: string): CairnError {
  if (isCairnError(error)) {
    return error.withPath(path);
  }

  return new CairnError(CairnErrno.SourceReadError, `Unable to read '${path}': ${errorToString(error)}`).withPath(path);
}

function withPath(error: unknown, path: string): unknown {
  return isCairnError(error) ? error.withPath(path) : error;
}
