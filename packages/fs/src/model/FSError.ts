// Subset of errno.h values that the file system implementations report.
export enum Errno {
  ENOENT,
  EIO,
  EACCES,
  EEXIST,
  ENOTDIR,
  EISDIR,
  EINVAL,
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

export function isFSError(error: unknown, errno?: Errno): error is FSError {
  return error instanceof FSError && (errno === undefined || error.errno === errno);
}
