import { Errno, FSError } from '../model/FSError';
import { ISimpleFS, ListEntry } from '../model/ISimpleFS';
import { Path } from '../model/Path';

interface FileEntry {
  kind: 'file';
  path: Path;
  content: Uint8Array;
}
interface DirectoryEntry {
  kind: 'dir';
  path: Path;
}
type Entry = FileEntry | DirectoryEntry;

export class InMemoryFS implements ISimpleFS {
  private readonly _store = new Map<string, Entry>();

  async fileExists(path: Path): Promise<boolean> {
    return this._store.get(path.value)?.kind === 'file';
  }

  async directoryExists(path: Path): Promise<boolean> {
    return path.isRoot || this._store.get(path.value)?.kind === 'dir';
  }

  async read(path: Path): Promise<Uint8Array> {
    const entry = this._store.get(path.value);
    if (entry === undefined) {
      throw new FSError(Errno.ENOENT, path.value);
    }

    if (entry.kind !== 'file') {
      throw new FSError(Errno.EISDIR, path.value);
    }

    // Stored contents are never shared with callers.
    return entry.content.slice();
  }

  async write(path: Path, data: Uint8Array): Promise<void> {
    if (path.isRoot || this._store.get(path.value)?.kind === 'dir') {
      throw new FSError(Errno.EISDIR, path.value);
    }

    this._ensureDirectory(path.getParent());
    this._store.set(path.value, {
      kind: 'file',
      path,
      content: data.slice(),
    });
  }

  async createDirectory(path: Path): Promise<void> {
    this._ensureDirectory(path);
  }

  async list(path: Path): Promise<ListEntry[]> {
    if (!(await this.directoryExists(path))) {
      const errno = this._store.has(path.value) ? Errno.ENOTDIR : Errno.ENOENT;
      throw new FSError(errno, path.value);
    }

    const results: ListEntry[] = [];
    for (const entry of this._store.values()) {
      if (path.isImmediateParentOf(entry.path)) {
        results.push({ kind: entry.kind, path: entry.path });
      }
    }

    results.sort((a, b) => (a.path.value > b.path.value ? 1 : a.path.value < b.path.value ? -1 : 0));
    return results;
  }

  /**
   * Creates every missing directory along `path`. Fails with ENOTDIR when a file is in the way.
   */
  private _ensureDirectory(path: Path) {
    const segments = path.segments;
    for (let i = 1; i <= segments.length; i++) {
      const current = new Path(segments.slice(0, i).join('/'));
      const entry = this._store.get(current.value);
      if (entry === undefined) {
        this._store.set(current.value, { kind: 'dir', path: current });
      }
      else if (entry.kind !== 'dir') {
        throw new FSError(Errno.ENOTDIR, current.value);
      }
    }
  }
}
