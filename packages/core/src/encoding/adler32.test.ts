import { adler32 } from './adler32';
import { encode } from './util';

describe('adler32', () => {
  test('empty input', () => {
    expect(adler32(new Uint8Array())).toBe(1);
  });

  test('ascii', () => {
    expect(adler32(encode('Wikipedia'))).toBe(0x11e60398);
  });

  test('long input is reduced without overflow', () => {
    const data = new Uint8Array(100000).fill(0xff);
    let a = 1;
    let b = 0;
    for (const byte of data) {
      a = (a + byte) % 65521;
      b = (b + a) % 65521;
    }

    expect(adler32(data)).toBe(((b * 65536) + a));
  });
});
