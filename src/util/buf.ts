import {bufferToUint8Array} from '@jsonjoy.com/util/lib/buffers/bufferToUint8Array';

export const cmpUint8Array = (a: Uint8Array, b: Uint8Array): 1 | 0 | -1 => {
  const len1 = a.length;
  const len2 = b.length;
  if (len1 > len2) return 1;
  if (len1 < len2) return -1;
  for (let i = 0; i < len1; i++) {
    const o1 = a[i];
    const o2 = b[i];
    if (o1 > o2) return 1;
    if (o1 < o2) return -1;
  }
  return 0;
};

const interpolate = (txt: TemplateStringsArray | string, args: unknown[]): string => {
  if (typeof txt === 'string') return txt;
  let str = '';
  for (let i = 0; i < txt.length; i++) {
    str += txt[i];
    if (i < args.length) str += String(args[i]);
  }
  return str;
};

/** Encodes text one byte per character; use for command names and numbers. */
export const ascii = (txt: TemplateStringsArray | string, ...args: unknown[]): Uint8Array => {
  const str = interpolate(txt, args);
  const len = str.length;
  const res = new Uint8Array(len);
  for (let i = 0; i < len; i++) res[i] = str.charCodeAt(i);
  return res;
};

export const utf8 = (txt: TemplateStringsArray | string, ...args: unknown[]): Uint8Array =>
  bufferToUint8Array(Buffer.from(interpolate(txt, args), 'utf8'));

/** Decodes a byte range as UTF-8 without copying it first. */
export const toUtf8 = (buf: Uint8Array): string =>
  Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength).toString('utf8');
