import {Writer} from '@jsonjoy.com/util/lib/buffers/Writer';
import {CommandError} from '../errors';
import {RESP} from './constants';
import type {Arg, Cmd} from '../types';
import type {RespReply} from './types';

const REG_RN = /[\r\n]/;
const REG_RN_ALL = /[\r\n]+/g;

export class RespEncoder {
  constructor(public readonly writer: Writer = new Writer()) {}

  /**
   * Serializes a command in the multi-bulk form: `*<argc>\r\n` followed by
   * `$<byte-length>\r\n<bytes>\r\n` per argument.
   */
  public encodeCmd(args: Cmd): Uint8Array {
    this.writeCmd(args);
    return this.writer.flush();
  }

  public writeCmd(args: Cmd): void {
    const length = args.length;
    if (!length) throw new Error('EMPTY_COMMAND');
    this.writeHeader(RESP.ARR, length);
    for (let i = 0; i < length; i++) this.writeArg(args[i]);
  }

  public writeArg(arg: Arg): void {
    if (arg instanceof Uint8Array) this.writeBulk(arg);
    else this.writeBulk(Buffer.from(typeof arg === 'number' ? String(arg) : arg, 'utf8'));
  }

  // ------------------------------------------------------------------ Replies

  public encode(reply: RespReply): Uint8Array {
    this.writeReply(reply);
    return this.writer.flush();
  }

  public writeReply(reply: RespReply): void {
    if (reply === null) return this.writeNull();
    switch (typeof reply) {
      case 'string':
        return this.writeStr(reply);
      case 'number':
      case 'bigint':
        return this.writeInt(reply);
    }
    if (reply instanceof Uint8Array) return this.writeBulk(reply);
    if (reply instanceof CommandError) return this.writeErr(reply.message);
    this.writeArr(reply);
  }

  /** Simple string, or a bulk string when the text spans lines. */
  public writeStr(str: string): void {
    if (REG_RN.test(str)) return this.writeBulk(Buffer.from(str, 'utf8'));
    this.writeLine(RESP.STR_SIMPLE, str);
  }

  public writeErr(message: string): void {
    this.writeLine(RESP.ERR, message.replace(REG_RN_ALL, ' '));
  }

  public writeInt(int: number | bigint): void {
    this.writeHeader(RESP.INT, int);
  }

  public writeBulk(buf: Uint8Array): void {
    const length = buf.length;
    this.writeHeader(RESP.STR_BULK, length);
    const writer = this.writer;
    writer.buf(buf, length);
    writer.u16(RESP.RN);
  }

  public writeNull(): void {
    this.writeHeader(RESP.STR_BULK, -1);
  }

  public writeArr(arr: RespReply[]): void {
    const length = arr.length;
    this.writeHeader(RESP.ARR, length);
    for (let i = 0; i < length; i++) this.writeReply(arr[i]);
  }

  protected writeHeader(tag: RESP, num: number | bigint): void {
    const writer = this.writer;
    writer.u8(tag);
    writer.ascii(String(num));
    writer.u16(RESP.RN);
  }

  protected writeLine(tag: RESP, str: string): void {
    const writer = this.writer;
    const buf = Buffer.from(str, 'utf8');
    writer.u8(tag);
    writer.buf(buf, buf.length);
    writer.u16(RESP.RN);
  }
}
