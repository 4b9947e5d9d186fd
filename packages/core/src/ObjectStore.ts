import * as fflate from 'fflate';
import { err, ok, Result, ResultAsync } from 'neverthrow';
import { Errno, ISimpleFS, isFSError, Path } from '@loosedb/fs';

import { Blob, Hash, Tree, TreeEntryInput } from './model';
import { adler32 } from './encoding/adler32';
import { decodeBlob, encodeBlob } from './encoding/blob';
import { decodeTree, encodeTree } from './encoding/tree';
import { parseHash } from './encoding/util';
import {
  createDecompressionError,
  createNotFoundError,
  createReadError,
  createWriteError,
  ObjectStoreError,
} from './errors';
import { ILogger, nullLogger } from './logging';
import { onFailure, tap } from './result';
import sha1 from './sha1';

export type CompressionLevel = NonNullable<fflate.ZlibOptions['level']>;

export interface ObjectStoreOptions {
  logger?: ILogger;
  /** zlib level used for new objects. Defaults to 6. */
  compressionLevel?: CompressionLevel;
}

export interface IReadOnlyObjectStore {
  getBlob(hash: string): ResultAsync<Blob, ObjectStoreError>;
  getTree(hash: string): ResultAsync<Tree, ObjectStoreError>;
  hasObject(hash: string): ResultAsync<boolean, ObjectStoreError>;
}

export interface IObjectStore extends IReadOnlyObjectStore {
  /**
   * Persists an already serialized object (header and payload) and returns the hash it is stored under.
   * Storing the same bytes again rewrites the same file with the same contents.
   */
  store(raw: Uint8Array): ResultAsync<Hash, ObjectStoreError>;
  storeBlob(content: Uint8Array): ResultAsync<Hash, ObjectStoreError>;
  storeTree(entries: readonly TreeEntryInput[]): ResultAsync<Hash, ObjectStoreError>;
}

/**
 * Loose object database: every object lives zlib-compressed at `<root>/<hash[0:2]>/<hash[2:]>`,
 * where the root is the root of the given file system.
 */
export class ObjectStore implements IObjectStore {
  private readonly _fs: ISimpleFS;
  private readonly _logger: ILogger;
  private readonly _compressionLevel: CompressionLevel;

  constructor(fs: ISimpleFS, options: ObjectStoreOptions = {}) {
    this._fs = fs;
    this._logger = options.logger ?? nullLogger;
    this._compressionLevel = options.compressionLevel ?? 6;
  }

  getBlob(hash: string): ResultAsync<Blob, ObjectStoreError> {
    return this._readObject(hash)
      .andThen(decodeBlob)
      .map(tap((blob: Blob) => this._logger.debug(`Blob ${blob.sha} parsed and validated`)))
      .mapErr(onFailure((error: ObjectStoreError) => this._logger.error(`Error reading blob ${hash}: ${error.message}`)));
  }

  getTree(hash: string): ResultAsync<Tree, ObjectStoreError> {
    return this._readObject(hash)
      .andThen(decodeTree)
      .map(tap((tree: Tree) => this._logger.debug(`Tree ${tree.sha} parsed with ${tree.entries.length} entries`)))
      .mapErr(onFailure((error: ObjectStoreError) => this._logger.error(`Error reading tree ${hash}: ${error.message}`)));
  }

  hasObject(hash: string): ResultAsync<boolean, ObjectStoreError> {
    return parseHash(hash).asyncAndThen(objectId => {
      const path = computeObjectPath(objectId);
      return ResultAsync.fromPromise(this._fs.fileExists(path), error => createReadError(error).withPath(path));
    });
  }

  store(raw: Uint8Array): ResultAsync<Hash, ObjectStoreError> {
    const hash = sha1(raw);
    this._logger.debug(`Generated hash: ${hash}`);

    const path = computeObjectPath(hash);
    const shardPath = path.getParent();
    const compressed = fflate.zlibSync(raw, { level: this._compressionLevel });

    return ResultAsync.fromPromise(this._fs.createDirectory(shardPath), error => createWriteError(error).withPath(shardPath))
      .andThen(() => ResultAsync.fromPromise(this._fs.write(path, compressed), error => createWriteError(error).withPath(path)))
      .map(() => {
        this._logger.debug(`Object written to ${path.value}`);
        return hash;
      })
      .mapErr(error => error.withObjectId(hash))
      .mapErr(onFailure((error: ObjectStoreError) => this._logger.error(`Error writing object ${hash}: ${error.message}`)));
  }

  storeBlob(content: Uint8Array): ResultAsync<Hash, ObjectStoreError> {
    return this.store(encodeBlob(content));
  }

  storeTree(entries: readonly TreeEntryInput[]): ResultAsync<Hash, ObjectStoreError> {
    return encodeTree(entries).asyncAndThen(raw => this.store(raw));
  }

  /**
   * Builds the blob a file would be stored as, without storing it.
   */
  generateBlob(source: ISimpleFS, filePath: Path): ResultAsync<Blob, ObjectStoreError> {
    return ensureFileExists(source, filePath, `File ${filePath.value} does not exist`)
      .andThen(() => readFile(source, filePath))
      .map(encodeBlob)
      .andThen(decodeBlob)
      .map(tap((blob: Blob) => this._logger.debug(`Generated blob ${blob.sha} from ${filePath.value}`)))
      .mapErr(onFailure((error: ObjectStoreError) => this._logger.error(`Error generating blob from ${filePath.value}: ${error.message}`)));
  }

  /**
   * Hash format, then path, then existence, then read, then inflate. The first failing stage wins.
   */
  private _readObject(hash: string): ResultAsync<Uint8Array, ObjectStoreError> {
    return parseHash(hash).asyncAndThen(objectId => {
      const path = computeObjectPath(objectId);
      return ensureFileExists(this._fs, path, `Object ${objectId} does not exist`)
        .map(tap((validated: Path) => this._logger.debug(`Path validated: ${validated.value}`)))
        .andThen(() => readFile(this._fs, path))
        .andThen(inflate)
        .map(tap((raw: Uint8Array) => this._logger.debug(`Decompressed ${raw.length} bytes`)))
        .mapErr(error => error.withObjectId(objectId));
    });
  }
}

export function computeObjectPath(hash: Hash): Path {
  return new Path(`${hash.substring(0, 2)}/${hash.substring(2)}`);
}

const ZLIB_HEADER_BYTES = 2;
const ZLIB_TRAILER_BYTES = 4;

const unzlib: (compressed: Uint8Array) => Result<Uint8Array, ObjectStoreError> = Result.fromThrowable(
  (compressed: Uint8Array) => fflate.unzlibSync(compressed),
  createDecompressionError,
);

/**
 * fflate drops the zlib trailer without reading it, so the Adler-32 checksum is verified here.
 * A truncated stream, a damaged trailer or bytes past the end of the stream all fail the check.
 */
function inflate(compressed: Uint8Array): Result<Uint8Array, ObjectStoreError> {
  if (compressed.length < ZLIB_HEADER_BYTES + ZLIB_TRAILER_BYTES) {
    return err(createDecompressionError(new Error(`Stream of ${compressed.length} bytes is shorter than the zlib header and trailer`)));
  }

  return unzlib(compressed).andThen(raw => {
    const view = new DataView(compressed.buffer, compressed.byteOffset, compressed.byteLength);
    const expected = view.getUint32(compressed.length - ZLIB_TRAILER_BYTES);
    const actual = adler32(raw);
    return actual === expected
      ? ok(raw)
      : err(createDecompressionError(new Error(`Adler-32 mismatch: stream says ${toHex(expected)}, content is ${toHex(actual)}`)));
  });
}

function toHex(checksum: number): string {
  return checksum.toString(16).padStart(8, '0');
}

function ensureFileExists(fs: ISimpleFS, path: Path, notFoundDetails: string): ResultAsync<Path, ObjectStoreError> {
  return ResultAsync.fromPromise(fs.fileExists(path), error => createReadError(error).withPath(path))
    .andThen(exists => (exists ? ok(path) : err(createNotFoundError(notFoundDetails).withPath(path))));
}

function readFile(fs: ISimpleFS, path: Path): ResultAsync<Uint8Array, ObjectStoreError> {
  return ResultAsync.fromPromise(fs.read(path), error =>
    (isFSError(error, Errno.ENOENT) ? createNotFoundError(`${path.value} disappeared while reading`) : createReadError(error))
      .withPath(path));
}
