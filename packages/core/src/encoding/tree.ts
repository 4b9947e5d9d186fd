import { err, ok, Result } from 'neverthrow';
import { createInvalidTreeEntryError, createTreeParseError, ObjectStoreError } from '../errors';
import { EntryType, HASH_BYTES, Mode, ObjectType, Tree, TreeEntry, TreeEntryInput } from '../model';
import sha1 from '../sha1';
import { concat, decode, encode, encodeHeader, isValidHash, NUL, packHash, SPACE, unpackHash } from './util';

const FILE_MODE_PREFIX = '100';

export function entryTypeFromMode(mode: string): EntryType {
  if (mode.startsWith(FILE_MODE_PREFIX)) return EntryType.blob;
  if (mode === Mode.tree) return EntryType.tree;
  return EntryType.unknown;
}

/**
 * Serializes the entries in the order given. Nothing is sorted or deduplicated.
 */
export function encodeTree(entries: readonly TreeEntryInput[]): Result<Uint8Array, ObjectStoreError> {
  const parts: Uint8Array[] = [];
  for (const entry of entries) {
    const problem = findFramingProblem(entry);
    if (problem !== undefined) {
      return err(createInvalidTreeEntryError(entry.path, problem));
    }

    parts.push(encode(`${entry.mode} ${entry.path}\0`), packHash(entry.sha));
  }

  const body = concat(...parts);
  return ok(concat(encodeHeader(ObjectType.tree, body.length), body));
}

const parseTreeEntriesSafe = Result.fromThrowable(parseTreeEntries, createTreeParseError);

/**
 * Parses a serialized tree. Unlike blobs, the header's type tag and length are not checked against the payload.
 * A single malformed entry fails the whole tree.
 */
export function decodeTree(raw: Uint8Array): Result<Tree, ObjectStoreError> {
  return parseTreeEntriesSafe(raw).map((entries): Tree => ({
    entries,
    sha: sha1(raw),
  }));
}

function parseTreeEntries(raw: Uint8Array): TreeEntry[] {
  const headerEnd = raw.indexOf(NUL);
  if (headerEnd < 0) throw new SyntaxError('Missing header terminator');

  const entries: TreeEntry[] = [];
  let i = headerEnd + 1;
  while (i < raw.length) {
    const space = raw.indexOf(SPACE, i);
    if (space < 0) throw new SyntaxError(`Missing space after mode at offset ${i}`);
    const nil = raw.indexOf(NUL, space + 1);
    if (nil < 0) throw new SyntaxError(`Missing null terminator after path at offset ${space + 1}`);

    const mode = decode(raw, i, space);
    entries.push({
      path: decode(raw, space + 1, nil),
      mode,
      type: entryTypeFromMode(mode),
      sha: unpackHash(raw, nil + 1),
    });

    i = nil + 1 + HASH_BYTES;
  }

  return entries;
}

function findFramingProblem(entry: TreeEntryInput): string | undefined {
  if (entry.mode === '' || /[ \0]/.test(entry.mode)) return `has an invalid mode '${entry.mode}'`;
  if (entry.path === '' || entry.path.includes('\0')) return 'has an empty path or a path containing NUL';
  if (!isValidHash(entry.sha)) return `references an invalid hash '${entry.sha}'`;
  return undefined;
}
