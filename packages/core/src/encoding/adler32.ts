const MOD_ADLER = 65521;
// Largest run of bytes whose sums cannot overflow 32 bits before reduction.
const NMAX = 5552;

/**
 * Adler-32 checksum as it appears in the zlib trailer.
 */
export function adler32(data: Uint8Array): number {
  let a = 1;
  let b = 0;
  for (let offset = 0; offset < data.length; offset += NMAX) {
    const end = Math.min(offset + NMAX, data.length);
    for (let i = offset; i < end; i++) {
      a += data[i];
      b += a;
    }

    a %= MOD_ADLER;
    b %= MOD_ADLER;
  }

  return ((b << 16) | a) >>> 0;
}
