import {CommandError, ProtocolError, UnexpectedTagError} from '../errors';
import {toUtf8} from '../util/buf';
import {MAX_BULK_LENGTH, RESP} from './constants';
import type {RespInteger, RespReply} from './types';

const REG_INT = /^[+-]?[0-9]+$/;
const INT64_MIN = -(BigInt(2) ** BigInt(63));
const INT64_MAX = BigInt(2) ** BigInt(63) - BigInt(1);
const SNIPPET_SIZE = 100;

/** Thrown while decoding when the buffered bytes end before the reply does. */
const INCOMPLETE = new RangeError('INCOMPLETE');

/**
 * Streaming RESP2 reply decoder. Socket chunks are {@link push}ed in as they
 * arrive, {@link read} returns one whole reply at a time, or `undefined` if
 * the buffer does not hold a complete reply yet. A partial reply leaves the
 * cursor where the reply started, so fragmentation is invisible to callers.
 *
 * ```ts
 * const decoder = new RespDecoder();
 * socket.on('data', (chunk) => {
 *   decoder.push(chunk);
 *   let reply;
 *   while ((reply = decoder.read()) !== undefined) handle(reply);
 * });
 * ```
 */
export class RespDecoder {
  /** Whether to decode bulk strings as UTF-8 text instead of raw bytes. */
  public utf8: boolean = false;

  protected uint8: Uint8Array;
  /** Read cursor. */
  protected x: number = 0;
  /** End of buffered data. */
  protected end: number = 0;

  constructor(allocSize: number = 16 * 1024) {
    this.uint8 = new Uint8Array(allocSize);
  }

  /** Number of buffered, not yet decoded bytes. */
  public size(): number {
    return this.end - this.x;
  }

  public push(data: Uint8Array): void {
    const length = data.length;
    if (!length) return;
    if (this.end + length > this.uint8.length) this.compact(length);
    this.uint8.set(data, this.end);
    this.end += length;
  }

  public reset(): void {
    this.x = 0;
    this.end = 0;
  }

  /**
   * Decodes the next reply.
   *
   * @returns The reply, or `undefined` if more bytes are needed.
   * @throws {ProtocolError} When the buffered bytes are not valid RESP.
   */
  public read(): RespReply | undefined {
    const x = this.x;
    if (x >= this.end) return undefined;
    try {
      const reply = this.readAny();
      if (this.x === this.end) this.reset();
      return reply;
    } catch (error) {
      if (error !== INCOMPLETE) throw error;
      this.x = x;
      return undefined;
    }
  }

  protected readAny(): RespReply {
    const tag = this.u8();
    switch (tag) {
      case RESP.STR_SIMPLE:
        return toUtf8(this.readLine());
      case RESP.ERR:
        return new CommandError(toUtf8(this.readLine()));
      case RESP.INT:
        return this.readInt();
      case RESP.STR_BULK:
        return this.readBulk();
      case RESP.ARR:
        return this.readArr();
    }
    const snippet = this.uint8.subarray(this.x, Math.min(this.end, this.x + SNIPPET_SIZE));
    throw new UnexpectedTagError(tag, toUtf8(snippet));
  }

  protected readInt(): RespInteger {
    const str = toUtf8(this.readLine());
    if (!REG_INT.test(str)) throw new ProtocolError(`Invalid RESP integer ${JSON.stringify(str)}.`);
    const num = Number(str);
    if (Number.isSafeInteger(num)) return num;
    const big = BigInt(str);
    if (big < INT64_MIN || big > INT64_MAX) throw new ProtocolError(`RESP integer out of range: ${str}.`);
    return big;
  }

  protected readBulk(): Uint8Array | string | null {
    const length = this.readLength();
    if (length === -1) return null;
    if (length > MAX_BULK_LENGTH) throw new ProtocolError(`Bulk string too long: ${length}.`);
    const x = this.x;
    const end = x + length;
    if (end + 2 > this.end) throw INCOMPLETE;
    const uint8 = this.uint8;
    if (uint8[end] !== RESP.R || uint8[end + 1] !== RESP.N)
      throw new ProtocolError(`Bulk string of length ${length} is not terminated by CRLF.`);
    this.x = end + 2;
    return this.utf8 ? toUtf8(uint8.subarray(x, end)) : uint8.slice(x, end);
  }

  protected readArr(): RespReply[] | null {
    const length = this.readLength();
    if (length === -1) return null;
    const arr: RespReply[] = [];
    for (let i = 0; i < length; i++) arr.push(this.readAny());
    return arr;
  }

  // ------------------------------------------------------------------ Reading

  protected u8(): number {
    if (this.x >= this.end) throw INCOMPLETE;
    return this.uint8[this.x++];
  }

  /** Line content up to `\n`, without the `\r` in front of it, if any. */
  protected readLine(): Uint8Array {
    const x = this.x;
    const uint8 = this.uint8;
    const offset = uint8.subarray(x, this.end).indexOf(RESP.N);
    if (offset < 0) throw INCOMPLETE;
    const n = x + offset;
    this.x = n + 1;
    return uint8.subarray(x, offset > 0 && uint8[n - 1] === RESP.R ? n - 1 : n);
  }

  /** Element count or byte length; `-1` stands for null. */
  protected readLength(): number {
    const length = this.readInt();
    if (typeof length !== 'number' || length < -1) throw new ProtocolError(`Invalid RESP length: ${length}.`);
    return length;
  }

  /** Moves unread bytes to the front, growing the buffer to fit `extra` more. */
  protected compact(extra: number): void {
    const {uint8, x, end} = this;
    const size = end - x;
    const required = size + extra;
    if (required <= uint8.length) uint8.copyWithin(0, x, end);
    else {
      const next = new Uint8Array(Math.max(required, uint8.length * 2));
      next.set(uint8.subarray(x, end));
      this.uint8 = next;
    }
    this.x = 0;
    this.end = size;
  }
}
