import {ascii, cmpUint8Array, toUtf8, utf8} from '../buf';

describe('cmpUint8Array', () => {
  test('orders shorter arrays first', () => {
    expect(cmpUint8Array(new Uint8Array([9]), new Uint8Array([1, 1]))).toBe(-1);
    expect(cmpUint8Array(new Uint8Array([1, 1]), new Uint8Array([9]))).toBe(1);
  });

  test('compares bytes of equal length arrays', () => {
    expect(cmpUint8Array(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(-1);
    expect(cmpUint8Array(new Uint8Array([1, 4]), new Uint8Array([1, 3]))).toBe(1);
    expect(cmpUint8Array(new Uint8Array([1, 3]), new Uint8Array([1, 3]))).toBe(0);
  });
});

describe('ascii', () => {
  test('one byte per character', () => {
    expect(ascii`GET`).toEqual(new Uint8Array([71, 69, 84]));
  });

  test('interpolates values', () => {
    expect(ascii`n:${42}`).toEqual(new Uint8Array([110, 58, 52, 50]));
  });

  test('accepts a plain string', () => {
    expect(ascii('OK')).toEqual(new Uint8Array([79, 75]));
  });
});

describe('utf8', () => {
  test('encodes multi-byte characters', () => {
    expect(utf8`é`).toEqual(new Uint8Array([0xc3, 0xa9]));
  });

  test('toUtf8 decodes a subarray without touching the rest', () => {
    const buf = utf8`xhéllox`;
    expect(toUtf8(buf.subarray(1, buf.length - 1))).toBe('héllo');
  });
});
