import * as net from 'net';
import {CommandError} from '../../errors';
import {CommandReader} from './CommandReader';
import type {RespEncoder} from '../../resp/RespEncoder';
import type {RespReply} from '../../resp/types';
import type {ParsedCmd} from '../../types';
import type {RespServerConnection} from './types';

const noop = () => {};

export class RespServerTcpConnection implements RespServerConnection {
  public oncmd: (cmd: ParsedCmd) => void = noop;
  protected readonly reader = new CommandReader();

  constructor(
    protected readonly socket: net.Socket,
    protected readonly encoder: RespEncoder,
  ) {
    socket.on('data', (data: Buffer) => {
      try {
        this.reader.push(data, (cmd) => this.oncmd(cmd));
      } catch (err) {
        // Request framing is lost, reply once and hang up.
        this.send(err instanceof CommandError ? err : new CommandError('ERR Protocol error'));
        this.close();
      }
    });
    // Without a listener an 'error' event would crash the process.
    socket.on('error', (err) => {
      // tslint:disable-next-line:no-console
      console.error('connection error', err);
    });
  }

  public send(reply: RespReply) {
    if (this.socket.writable) this.socket.write(this.encoder.encode(reply));
  }

  public close() {
    this.socket.end();
  }
}
