import fs from 'fs/promises';
import path from 'path';

import { Errno, FSError } from '../model/FSError';
import { ISimpleFS, ListEntry } from '../model/ISimpleFS';
import { Path } from '../model/Path';

export class NodeFS implements ISimpleFS {
  private readonly _basePath: string;

  get physicalRoot(): string {
    return this._basePath;
  }

  constructor(basePath: string) {
    this._basePath = path.resolve(basePath);
  }

  async fileExists(path: Path): Promise<boolean> {
    const stat = await this._tryStat(path);
    return stat !== undefined && stat.isFile();
  }

  async directoryExists(path: Path): Promise<boolean> {
    const stat = await this._tryStat(path);
    return stat !== undefined && stat.isDirectory();
  }

  async read(path: Path): Promise<Uint8Array> {
    const physicalPath = this._toPhysical(path);
    try {
      const data = await fs.readFile(physicalPath);
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    }
    catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async write(path: Path, data: Uint8Array): Promise<void> {
    const physicalPath = this._toPhysical(path);
    try {
      if (!path.isRoot) {
        await fs.mkdir(this._toPhysical(path.getParent()), { recursive: true });
      }

      await fs.writeFile(physicalPath, data);
    }
    catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async createDirectory(path: Path): Promise<void> {
    const physicalPath = this._toPhysical(path);
    try {
      // `recursive` makes this a no-op when the directory is already there.
      await fs.mkdir(physicalPath, { recursive: true });
    }
    catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  async list(path: Path): Promise<ListEntry[]> {
    const physicalPath = this._toPhysical(path);
    try {
      const entries = await fs.readdir(physicalPath, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile() || entry.isDirectory())
        .map<ListEntry>(entry => ({
          path: Path.join(path, entry.name),
          kind: entry.isFile() ? 'file' : 'dir',
        }))
        .sort((a, b) => (a.path.value > b.path.value ? 1 : a.path.value < b.path.value ? -1 : 0));
    }
    catch (error) {
      throw wrapFsError(error, physicalPath);
    }
  }

  private _toPhysical(path: Path): string {
    return path.isRoot ? this._basePath : this._basePath + '/' + path.value;
  }

  private async _tryStat(path: Path) {
    const physicalPath = this._toPhysical(path);
    try {
      return await fs.stat(physicalPath);
    }
    catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return undefined;
      }

      throw wrapFsError(error, physicalPath);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function isKnownErrno(code: string): code is keyof typeof Errno {
  return code in Errno;
}

function wrapFsError(error: unknown, physicalPath: string): FSError {
  if (isErrnoException(error) && error.code !== undefined && isKnownErrno(error.code)) {
    return new FSError(Errno[error.code], physicalPath, `Node.js fs error: ${error.message}`);
  }

  return new FSError(Errno.EIO, physicalPath, `Unknown Node.js fs error: ${String(error)}`);
}
