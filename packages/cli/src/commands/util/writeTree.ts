import { err, ok, Result, ResultAsync } from 'neverthrow';
import { ISimpleFS, Path } from '@loosedb/fs';
import { errorToString, Hash, Mode, ObjectStore, ObjectStoreErrno, ObjectStoreError, TreeEntryInput } from '@loosedb/core';

export interface WriteTreeOptions {
  /** Names skipped at every level. */
  ignore?: readonly string[];
}

/**
 * Stores every file below the root of `worktree` as a blob and every non-empty directory as a tree,
 * and returns the hash of the root tree.
 */
export async function writeTree(store: ObjectStore, worktree: ISimpleFS, options: WriteTreeOptions = {}): Promise<Result<Hash, ObjectStoreError>> {
  const entries = await collectEntries(store, worktree, new Path(''), options.ignore ?? ['.loosedb']);
  if (entries.isErr()) {
    return err(entries.error);
  }

  return await store.storeTree(entries.value);
}

async function collectEntries(store: ObjectStore, worktree: ISimpleFS, dir: Path, ignore: readonly string[]): Promise<Result<TreeEntryInput[], ObjectStoreError>> {
  const listing = await ResultAsync.fromPromise(worktree.list(dir), error =>
    new ObjectStoreError(ObjectStoreErrno.ReadFailure, errorToString(error), error).withPath(dir));
  if (listing.isErr()) {
    return err(listing.error);
  }

  const entries: TreeEntryInput[] = [];
  for (const node of listing.value) {
    const name = node.path.leafName;
    if (ignore.includes(name)) {
      continue;
    }

    if (node.kind === 'file') {
      const hash = await store.generateBlob(worktree, node.path).andThen(blob => store.storeBlob(blob.content));
      if (hash.isErr()) {
        return err(hash.error);
      }

      entries.push({ mode: Mode.file, path: name, sha: hash.value });
    } else {
      const children = await collectEntries(store, worktree, node.path, ignore);
      if (children.isErr()) {
        return err(children.error);
      }

      // Like git, empty directories are not recorded.
      if (children.value.length === 0) {
        continue;
      }

      const hash = await store.storeTree(children.value);
      if (hash.isErr()) {
        return err(hash.error);
      }

      entries.push({ mode: Mode.tree, path: name, sha: hash.value });
    }
  }

  return ok(entries.sort(treeSort));
}

/**
 * git orders tree entries as if directory names ended with a slash.
 */
export function treeSort(a: TreeEntryInput, b: TreeEntryInput): number {
  const aa = a.mode === Mode.tree ? `${a.path}/` : a.path;
  const bb = b.mode === Mode.tree ? `${b.path}/` : b.path;
  return aa > bb ? 1 : aa < bb ? -1 : 0;
}
