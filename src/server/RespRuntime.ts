import {CommandError} from '../errors';
import {commands} from './commands';
import {RespCore} from './RespCore';
import type {Command} from './Command';
import type {ParsedCmd} from '../types';
import type {RespReply} from '../resp/types';
import type {RespServerConnection} from './connection/types';

export class RespRuntime {
  public readonly core: RespCore = new RespCore();
  protected readonly commands = new Map<string, Command>();

  constructor() {
    for (const cmd of commands) this.commands.set(cmd.name, cmd);
  }

  public exec(cmd: ParsedCmd, connection: RespServerConnection): RespReply | undefined {
    const cmdName = cmd[0].toUpperCase();
    const command = this.commands.get(cmdName);
    if (!command) throw new CommandError(`ERR unknown command '${cmd[0]}'`);
    if (!command.accepts(cmd.length))
      throw new CommandError(`ERR wrong number of arguments for '${cmdName.toLowerCase()}' command`);
    return command.exec(cmd, this.core, connection);
  }
}
