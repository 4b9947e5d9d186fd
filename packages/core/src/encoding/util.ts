import { err, ok, Result } from 'neverthrow';
import { createInvalidHashError, ObjectStoreError } from '../errors';
import { Hash, HASH_BYTES, HASH_LENGTH, ObjectType } from '../model';

export const NUL = 0x00;
export const SPACE = 0x20;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const hashRegex = new RegExp(`^[0-9a-fA-F]{${HASH_LENGTH}}$`);

export function encode(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decode(buffer: Uint8Array, start = 0, end = buffer.length): string {
  return decoder.decode(buffer.subarray(start, end));
}

export function concat(...arrays: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(arrays.reduce((size, array) => size + array.length, 0));
  let offset = 0;
  for (const array of arrays) {
    result.set(array, offset);
    offset += array.length;
  }

  return result;
}

/**
 * `"<type> <byteLength>\0"`. The length is the payload size in bytes, never in characters.
 */
export function encodeHeader(type: ObjectType, byteLength: number): Uint8Array {
  return encode(`${type} ${byteLength}\0`);
}

export function isValidHash(hash: string): boolean {
  return hashRegex.test(hash);
}

/**
 * Validates the format of a hash and normalizes it to lowercase.
 */
export function parseHash(hash: string): Result<Hash, ObjectStoreError> {
  return isValidHash(hash) ? ok(hash.toLowerCase()) : err(createInvalidHashError(hash));
}

export function packHash(hash: Hash): Uint8Array {
  if (!isValidHash(hash)) {
    throw new Error(`Invalid hash '${hash}'`);
  }

  const bytes = new Uint8Array(HASH_BYTES);
  for (let i = 0; i < HASH_BYTES; i++) {
    bytes[i] = parseInt(hash.substring(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

export function unpackHash(buffer: Uint8Array, start: number): Hash {
  if (start < 0 || start + HASH_BYTES > buffer.length) {
    throw new RangeError(`Expected ${HASH_BYTES} hash bytes at offset ${start}, found ${Math.max(0, buffer.length - start)}`);
  }

  let hash = '';
  for (let i = start; i < start + HASH_BYTES; i++) {
    hash += buffer[i].toString(16).padStart(2, '0');
  }

  return hash;
}
