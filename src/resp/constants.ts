export const enum RESP {
  // Delimiters
  R = 0x0d, // \r
  N = 0x0a, // \n
  RN = 0x0d0a, // \r\n

  // Tags
  STR_SIMPLE = 0x2b, // +
  ERR = 0x2d, // -
  INT = 0x3a, // :
  STR_BULK = 0x24, // $
  ARR = 0x2a, // *
}

/** Largest bulk string a server will send by default (proto-max-bulk-len). */
export const MAX_BULK_LENGTH = 512 * 1024 * 1024;
