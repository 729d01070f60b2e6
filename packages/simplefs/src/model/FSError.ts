// POSIX-style error numbers, limited to what the backends can produce
export enum Errno {
  Success,
  EPERM,
  ENOENT,
  EIO,
  EACCES,
  EBUSY,
  EEXIST,
  ENOTDIR,
  EISDIR,
  EINVAL,
  ENOTEMPTY,
}

export class FSError extends Error {
  readonly errno: Errno;
  readonly path?: string;

  constructor(errno: Errno, path: string | undefined, message?: string) {
    super(message ?? `${Errno[errno]}${path !== undefined ? ` (path: '${path}')` : ''}`);
    this.name = 'FSError';
    this.errno = errno;
    this.path = path;
  }
}

export function isFSError(error: unknown, ...errnos: Errno[]): error is FSError {
  return error instanceof FSError && (errnos.length === 0 || errnos.includes(error.errno));
}
