import {CommandError} from '../errors';
import {RespRuntime} from './RespRuntime';
import type {ParsedCmd} from '../types';
import type {RespReply} from '../resp/types';
import type {RespServerConnection} from './connection/types';

export class RespServer {
  public readonly runtime = new RespRuntime();

  public onConnection(connection: RespServerConnection) {
    connection.oncmd = (cmd: ParsedCmd) => {
      let reply: RespReply | undefined;
      try {
        reply = this.runtime.exec(cmd, connection);
      } catch (err) {
        if (err instanceof CommandError) reply = err;
        else reply = new CommandError(err instanceof Error ? `ERR ${err.message}` : 'ERR unknown error');
      }
      if (reply !== undefined) connection.send(reply);
    };
  }
}
