import { Path } from '@loosedb/fs';
import { createDecompressionError, errorToString, ObjectStoreErrno, ObjectStoreError } from './errors';

describe('ObjectStoreError', () => {
  test('message', () => {
    expect(new ObjectStoreError(ObjectStoreErrno.NotFound).message).toBe('NotFound');
    expect(new ObjectStoreError(ObjectStoreErrno.WriteFailure, 'disk full').message).toBe('WriteFailure. Details: disk full');
  });

  test('is an Error', () => {
    const error = new ObjectStoreError(ObjectStoreErrno.InvalidHash);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ObjectStoreError');
  });

  test('context is only set once', () => {
    const error = new ObjectStoreError(ObjectStoreErrno.NotFound)
      .withObjectId('first')
      .withObjectId('second')
      .withPath(new Path('a/b'))
      .withPath(new Path('c'));
    expect(error.objectId).toBe('first');
    expect(error.path?.value).toBe('a/b');
  });

  test('keeps the cause', () => {
    const cause = new Error('invalid zlib data');
    const error = createDecompressionError(cause);
    expect(error.errno).toBe(ObjectStoreErrno.DecompressionFailure);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('DecompressionFailure. Details: Failed to decompress: Error: invalid zlib data');
  });

  test('errorToString', () => {
    expect(errorToString(new TypeError('boom'))).toBe('TypeError: boom');
    expect(errorToString('plain')).toBe('plain');
  });
});
