import type {CommandError} from '../errors';

/** A signed 64-bit integer reply; `bigint` only outside the safe integer range. */
export type RespInteger = number | bigint;

/**
 * A decoded RESP2 reply:
 *
 * - `+` simple string: `string`
 * - `-` error: {@link CommandError}
 * - `:` integer: {@link RespInteger}
 * - `$` bulk string: `Uint8Array`, or `string` when UTF-8 decoding is on; `null` for `$-1`
 * - `*` array: `RespReply[]`; `null` for `*-1`
 */
export type RespReply = string | RespInteger | Uint8Array | null | CommandError | RespReply[];
