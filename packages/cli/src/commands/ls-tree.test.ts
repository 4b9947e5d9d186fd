import { InMemoryFS } from '@loosedb/fs';
import { EntryType, Mode, ObjectStore, ObjectStoreErrno } from '@loosedb/core';
import { formatTreeEntry, listTree } from './ls-tree';

const ccHash = '2652f5f42c003f125212dd61f95a3a8a37cb45d5';
const treeHash = 'bc3aa3eb92286b2ddaab0bef7564f25098f8fbdc';

describe('ls-tree', () => {
  test('formatTreeEntry', () => {
    expect(formatTreeEntry({
      mode: '040000',
      path: 'sub dir',
      type: EntryType.tree,
      sha: 'bc3aa3eb92286b2ddaab0bef7564f25098f8fbdc',
    })).toBe('040000 tree bc3aa3eb92286b2ddaab0bef7564f25098f8fbdc\tsub dir');
  });

  describe('listTree', () => {
    let store: ObjectStore;
    beforeEach(async () => {
      store = new ObjectStore(new InMemoryFS());
      expect((await store.storeTree([{ mode: Mode.file, path: 'c.txt', sha: ccHash }]))._unsafeUnwrap()).toBe(treeHash);
    });

    test('full lines', async () => {
      expect((await listTree(store, treeHash, false))._unsafeUnwrap())
        .toEqual([`100644 blob ${ccHash}\tc.txt`]);
    });

    test('names only', async () => {
      expect((await listTree(store, treeHash, true))._unsafeUnwrap()).toEqual(['c.txt']);
    });

    test('missing tree', async () => {
      const error = (await listTree(store, ccHash, false))._unsafeUnwrapErr();
      expect(error.errno).toBe(ObjectStoreErrno.NotFound);
    });
  });
});
