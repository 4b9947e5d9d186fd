import { Path } from '@loosedb/fs';
import { Hash } from './model';

export enum ObjectStoreErrno {
  InvalidHash,
  NotFound,
  ReadFailure,
  DecompressionFailure,
  BlobDecodeFailure,
  TreeDecodeFailure,
  InvalidTreeEntry,
  WriteFailure,
}

export class ObjectStoreError extends Error {
  private readonly _errno: ObjectStoreErrno;
  private _objectId?: Hash;
  private _path?: Path;

  get errno() { return this._errno; }
  get objectId() { return this._objectId; }
  get path() { return this._path; }

  constructor(errno: ObjectStoreErrno, details?: string, cause?: unknown) {
    super(`${ObjectStoreErrno[errno]}${details ? `. Details: ${details}` : ''}`, cause === undefined ? undefined : { cause });
    this.name = 'ObjectStoreError';
    this._errno = errno;
  }

  withObjectId(objectId: Hash): ObjectStoreError {
    if (this._objectId === undefined) {
      this._objectId = objectId;
    }

    return this;
  }

  withPath(path: Path): ObjectStoreError {
    if (this._path === undefined) {
      this._path = path;
    }

    return this;
  }
}

export function createInvalidHashError(hash: string) {
  return new ObjectStoreError(ObjectStoreErrno.InvalidHash, `'${hash}' is not 40 hexadecimal characters`);
}

export function createNotFoundError(details: string) {
  return new ObjectStoreError(ObjectStoreErrno.NotFound, details);
}

export function createReadError(cause: unknown) {
  return new ObjectStoreError(ObjectStoreErrno.ReadFailure, errorToString(cause), cause);
}

export function createDecompressionError(cause: unknown) {
  return new ObjectStoreError(ObjectStoreErrno.DecompressionFailure, `Failed to decompress: ${errorToString(cause)}`, cause);
}

export function createBlobHeaderError() {
  return new ObjectStoreError(ObjectStoreErrno.BlobDecodeFailure, 'Failed to parse blob header or length mismatch');
}

export function createTreeParseError(cause: unknown) {
  return new ObjectStoreError(ObjectStoreErrno.TreeDecodeFailure, `Failed to parse tree: ${errorToString(cause)}`, cause);
}

export function createInvalidTreeEntryError(path: string, reason: string) {
  return new ObjectStoreError(ObjectStoreErrno.InvalidTreeEntry, `Entry '${path}' ${reason}`);
}

export function createWriteError(cause: unknown) {
  return new ObjectStoreError(ObjectStoreErrno.WriteFailure, `Error during the writing process: ${errorToString(cause)}`, cause);
}

export function errorToString(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
