export type Hash = string;

export const HASH_LENGTH = 40;
export const HASH_BYTES = 20;

export enum ObjectType {
  blob = 'blob',
  tree = 'tree',
}

/**
 * Classification of a tree entry, derived from its mode.
 */
export enum EntryType {
  unknown = 'unknown',
  blob = 'blob',
  tree = 'tree',
}

export enum Mode {
  file = '100644',
  exec = '100755',
  sym = '120000',
  tree = '040000',
}

export type Blob = {
  readonly content: Uint8Array;
  readonly sha: Hash;
};

export type TreeEntry = {
  readonly path: string;
  readonly mode: string;
  readonly type: EntryType;
  /** Object referenced by this entry. It is not loaded nor checked when the tree is decoded. */
  readonly sha: Hash;
};

/**
 * What a caller supplies to encode a tree entry; the type is derived from the mode.
 */
export type TreeEntryInput = Omit<TreeEntry, 'type'>;

export type Tree = {
  readonly entries: readonly TreeEntry[];
  readonly sha: Hash;
};
