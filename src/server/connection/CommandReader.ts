import {RespStreamingDecoder} from '@jsonjoy.com/json-pack/lib/resp/RespStreamingDecoder';
import {CommandError} from '../../errors';
import type {ParsedCmd} from '../../types';

/** Splits a request byte stream into commands. */
export class CommandReader {
  protected readonly decoder = new RespStreamingDecoder();

  public push(data: Uint8Array, oncmd: (cmd: ParsedCmd) => void): void {
    const decoder = this.decoder;
    decoder.push(data);
    while (true) {
      const cmd = decoder.readCmd();
      if (cmd === undefined) break;
      if (!Array.isArray(cmd) || !cmd.length) throw new CommandError('ERR Protocol error: expected a multi-bulk request');
      oncmd(cmd);
    }
  }
}
