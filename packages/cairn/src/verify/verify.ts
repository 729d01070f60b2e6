import { IObjectStore } from '../db/ObjectStore';
import { CairnObject, decodeObjectAndWrapErrors } from '../db/objects';
import { CairnErrno, createAbortedError, isCairnError } from '../db/errors';
import { Hash, Kind, RawObject } from '../db/model';
import { compareBytewise, errorToString, kindOfMode } from '../db/util';
import { Semaphore } from '../internal/Semaphore';

/**
 * Names of the references followed from the root to reach an object.
 * Tree entries contribute their name, commits contribute `(tree)` and `(parent N)` (1-based).
 */
export type ReferencePath = readonly string[];

export type Problem =
  | { readonly type: 'missing'; readonly hash: Hash; readonly path: ReferencePath }
  | { readonly type: 'hashMismatch'; readonly hash: Hash; readonly actualHash?: Hash; readonly path: ReferencePath }
  | { readonly type: 'malformed'; readonly hash: Hash; readonly message: string; readonly path: ReferencePath }
  | { readonly type: 'kindMismatch'; readonly hash: Hash; readonly expected: Kind; readonly actual: Kind; readonly path: ReferencePath };

export type CorruptionReport = {
  readonly ok: boolean;
  readonly root: Hash;
  /**
   * Distinct objects examined. Objects reachable along several paths count once.
   */
  readonly objectsChecked: number;
  readonly problems: Problem[];
  /**
   * The walk was cancelled; the report covers only what was examined before.
   */
  readonly aborted: boolean;
};

export interface VerifyOptions {
  /**
   * Maximum number of objects read at once. Defaults to 8.
   */
  concurrency?: number;
  signal?: AbortSignal;

  /**
   * Called after each object is examined.
   */
  onObject?: (hash: Hash, kind: Kind | undefined, path: ReferencePath) => void;
}

const DEFAULT_CONCURRENCY = 8;

/**
 * Walks everything reachable from `root` (commit, tree or blob), checking that each object exists,
 * hashes to its digest, decodes, and has the kind its referrer expects.
 * Data corruption is reported, never thrown. Objects that fail a check are not descended into.
 */
export async function verify(store: IObjectStore, root: Hash, options?: VerifyOptions): Promise<CorruptionReport> {
  const verifier = new Verifier(store, new Semaphore(options?.concurrency ?? DEFAULT_CONCURRENCY), options ?? {});
  await verifier.visit(root, undefined, []);

  const problems = verifier.problems.sort(compareProblems);
  const aborted = options?.signal?.aborted ?? false;
  return {
    ok: problems.length === 0 && !aborted,
    root,
    objectsChecked: verifier.objectsChecked,
    problems,
    aborted,
  };
}

class Verifier {
  readonly problems: Problem[] = [];
  private readonly _visited = new Map<Hash, Promise<Kind | undefined>>();
  private _objectsChecked = 0;

  constructor(
    private readonly _store: IObjectStore,
    private readonly _semaphore: Semaphore,
    private readonly _options: VerifyOptions,
  ) { }

  get objectsChecked(): number {
    return this._objectsChecked;
  }

  async visit(hash: Hash, expected: Kind | undefined, path: ReferencePath): Promise<void> {
    if (this._options.signal?.aborted) {
      return;
    }

    let kind = this._visited.get(hash);
    if (kind === undefined) {
      const object = this._check(hash, path);
      kind = object.then(o => o?.kind, () => undefined);
      this._visited.set(hash, kind);
      const loaded = await object;
      if (loaded !== undefined) {
        await this._descend(loaded, path);
      }
    }

    // Each referrer's expectation is checked, including referrers that reached an already examined object
    const actual = await kind;
    if (actual !== undefined && expected !== undefined && actual !== expected) {
      this.problems.push({ type: 'kindMismatch', hash, expected, actual, path });
    }
  }

  private async _check(hash: Hash, path: ReferencePath): Promise<CairnObject | undefined> {
    let object: CairnObject | undefined;
    try {
      object = await this._semaphore.run(async () => {
        if (this._options.signal?.aborted) {
          throw createAbortedError();
        }

        return await this._load(hash, path);
      });
    } catch (error) {
      if (isCairnError(error, CairnErrno.Aborted)) {
        return undefined;
      }

      throw error;
    }

    this._objectsChecked++;
    this._options.onObject?.(hash, object?.kind, path);
    return object;
  }

  private async _load(hash: Hash, path: ReferencePath): Promise<CairnObject | undefined> {
    let raw: RawObject;
    try {
      raw = await this._store.get(hash);
    } catch (error) {
      if (isCairnError(error, CairnErrno.ObjectNotFound)) {
        this.problems.push({ type: 'missing', hash, path });
        return undefined;
      }
      if (isCairnError(error, CairnErrno.MalformedEncoding)) {
        this.problems.push({ type: 'malformed', hash, message: errorToString(error), path });
        return undefined;
      }
      if (isCairnError(error, CairnErrno.HashMismatch)) {
        // Damaged stored bytes, or a digest check by a store that verifies on read
        this.problems.push({ type: 'hashMismatch', hash, path });
        return undefined;
      }

      throw error;
    }

    const actualHash = this._store.hasher.digest(raw.kind, raw.body);
    if (actualHash !== hash) {
      this.problems.push({ type: 'hashMismatch', hash, actualHash, path });
      return undefined;
    }

    try {
      return decodeObjectAndWrapErrors(raw, hash, this._store.hasher);
    } catch (error) {
      if (isCairnError(error, CairnErrno.MalformedEncoding)) {
        this.problems.push({ type: 'malformed', hash, message: errorToString(error), path });
        return undefined;
      }

      throw error;
    }
  }

  private async _descend(object: CairnObject, path: ReferencePath): Promise<void> {
    switch (object.kind) {
      case Kind.blob:
        return;
      case Kind.tree:
        await Promise.all(object.body.map(entry => this.visit(entry.hash, kindOfMode(entry.mode), [...path, entry.name])));
        return;
      case Kind.commit:
        await Promise.all([
          this.visit(object.body.tree, Kind.tree, [...path, '(tree)']),
          ...object.body.parents.map((parent, i) => this.visit(parent, Kind.commit, [...path, `(parent ${i + 1})`])),
        ]);
        return;
    }
  }
}

function compareProblems(a: Problem, b: Problem): number {
  return compareBytewise(a.path.join('/'), b.path.join('/')) || compareBytewise(a.hash, b.hash);
}
