import { err, ok, Result } from 'neverthrow';
import { createBlobHeaderError, ObjectStoreError } from '../errors';
import { Blob, ObjectType } from '../model';
import sha1 from '../sha1';
import { concat, decode, encodeHeader, NUL } from './util';

export function encodeBlob(content: Uint8Array): Uint8Array {
  return concat(encodeHeader(ObjectType.blob, content.length), content);
}

/**
 * Parses `"blob <length>\0<content>"`. The type tag and the declared length are validated together:
 * any mismatch yields the same BlobDecodeFailure.
 */
export function decodeBlob(raw: Uint8Array): Result<Blob, ObjectStoreError> {
  const nil = raw.indexOf(NUL);
  if (nil < 0 || declaredBlobLength(decode(raw, 0, nil)) !== raw.length - nil - 1) {
    return err(createBlobHeaderError());
  }

  return ok({
    content: raw.slice(nil + 1),
    sha: sha1(raw),
  });
}

function declaredBlobLength(header: string): number | undefined {
  const parts = header.split(' ');
  if (parts.length !== 2 || parts[0] !== ObjectType.blob || !/^[0-9]+$/.test(parts[1])) {
    return undefined;
  }

  return Number(parts[1]);
}
