import type {ParsedCmd} from '../types';
import type {RespReply} from '../resp/types';
import type {RespCore} from './RespCore';
import type {RespServerConnection} from './connection/types';

/**
 * Command handler. Returns the reply, or `undefined` when it has written
 * the reply to the connection itself.
 */
export type CommandExec = (cmd: ParsedCmd, core: RespCore, connection: RespServerConnection) => RespReply | undefined;

export class Command {
  constructor(
    public readonly name: string,
    /** Argument count including the name; negative means "at least". */
    public readonly arity: number,
    public readonly exec: CommandExec,
  ) {}

  public accepts(argc: number): boolean {
    const arity = this.arity;
    return arity < 0 ? argc >= -arity : argc === arity;
  }
}
