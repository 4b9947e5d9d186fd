import { Path } from './Path';

/**
 * Append-only file system surface used by the object store. Paths are relative to the root of the instance.
 */
export interface ISimpleFS {
  fileExists(path: Path): Promise<boolean>;
  read(path: Path): Promise<Uint8Array>;

  /**
   * Writes the whole file, replacing any previous contents. Parent directories are created as needed.
   */
  write(path: Path, data: Uint8Array): Promise<void>;

  directoryExists(path: Path): Promise<boolean>;
  list(path: Path): Promise<ListEntry[]>;

  /**
   * Creates the directory and its parents. Succeeds when the directory already exists.
   */
  createDirectory(path: Path): Promise<void>;
}

export interface ListEntry {
  path: Path;
  kind: 'file' | 'dir';
}
