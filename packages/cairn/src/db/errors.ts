import { Hash, Kind } from './model';

export enum CairnErrno {
  BadStore,
  InvalidHash,
  ObjectNotFound,
  HashMismatch,
  MalformedEncoding,
  ObjectKindMismatch,
  SourceReadError,
  InvalidTreeEntry,
  Aborted,
}

export class CairnError extends Error {
  private readonly _errno: CairnErrno;
  private _objectId?: Hash;
  private _path?: string;

  get errno() { return this._errno; }
  get objectId() { return this._objectId; }
  get path() { return this._path; }

  constructor(errno: CairnErrno, details?: string) {
    super(`${CairnErrno[errno]}${details ? `. Details: ${details}` : ''}`);
    this.name = 'CairnError';
    this._errno = errno;
  }

  withObjectId(objectId: Hash): CairnError {
    if (this._objectId === undefined) {
      this._objectId = objectId;
    }

    return this;
  }

  /**
   * Slash separated location of the failure, relative to the root being processed.
   */
  withPath(path: string): CairnError {
    if (this._path === undefined) {
      this._path = path;
    }

    return this;
  }
}

export function isCairnError(error: unknown, ...errnos: CairnErrno[]): error is CairnError {
  return error instanceof CairnError && (errnos.length === 0 || errnos.includes(error.errno));
}

export function createObjectNotFoundError(hash: Hash): CairnError {
  return new CairnError(CairnErrno.ObjectNotFound, `Object does not exist: ${hash}`).withObjectId(hash);
}

export function createHashMismatchError(expected: Hash, actual: Hash): CairnError {
  return new CairnError(CairnErrno.HashMismatch, `Object ${expected} hashes to ${actual}`).withObjectId(expected);
}

/**
 * The persisted bytes no longer decompress to a valid object, so no digest can be computed for them.
 */
export function createDamagedObjectError(expected: Hash, details: string): CairnError {
  return new CairnError(CairnErrno.HashMismatch, `Stored bytes of ${expected} are damaged: ${details}`).withObjectId(expected);
}

export function createObjectKindMismatchError(hash: Hash, expectedKind: Kind, actualKind: Kind): CairnError {
  return new CairnError(CairnErrno.ObjectKindMismatch, `Object ${hash} is not a ${expectedKind}, found ${actualKind}`).withObjectId(hash);
}

export function createAbortedError(): CairnError {
  return new CairnError(CairnErrno.Aborted, 'Operation was cancelled');
}
