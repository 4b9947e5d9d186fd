export { ObjectType, EntryType, Mode, HASH_LENGTH, HASH_BYTES } from './model';
export type { Hash, Blob, Tree, TreeEntry, TreeEntryInput } from './model';

export { ObjectStore, computeObjectPath } from './ObjectStore';
export type { IObjectStore, IReadOnlyObjectStore, ObjectStoreOptions, CompressionLevel } from './ObjectStore';

export { encodeBlob, decodeBlob } from './encoding/blob';
export { encodeTree, decodeTree, entryTypeFromMode } from './encoding/tree';
export { isValidHash, parseHash } from './encoding/util';
export { default as sha1 } from './sha1';

export { ObjectStoreError, ObjectStoreErrno, errorToString } from './errors';
export { tap, onFailure } from './result';
export { nullLogger } from './logging';
export type { ILogger } from './logging';
