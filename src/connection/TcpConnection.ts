import * as net from 'net';
import {FanOut} from 'thingies/lib/fanout';
import {printTree} from 'tree-dump/lib/printTree';
import {TransportError} from '../errors';
import type {RespSocket, RespSocketState} from './types';

export interface TcpConnectionOpts {
  /** Hostname or IP address of the server. Defaults to 'localhost'. */
  host?: string;
  /** Port of the server. Defaults to 6379. */
  port?: number;
  /** Creates the underlying socket; `host` and `port` are only informative when set. */
  createSocket?: () => net.Socket;
}

export class TcpConnection implements RespSocket {
  public readonly host: string;
  public readonly port: number;
  public readonly onData = new FanOut<Uint8Array>();
  public readonly onClose = new FanOut<TransportError>();

  protected readonly createSocket: () => net.Socket;
  protected socket?: net.Socket = undefined;
  protected error?: Error = undefined;
  private _state: RespSocketState = 'unconnected';

  constructor({host = 'localhost', port = 6379, createSocket}: TcpConnectionOpts = {}) {
    this.host = host;
    this.port = port;
    this.createSocket = createSocket ?? (() => net.connect({host, port}));
  }

  public get state(): RespSocketState {
    return this._state;
  }

  public connect(): Promise<void> {
    if (this._state !== 'unconnected') return Promise.reject(new TransportError(this._state === 'closed' ? 'CLOSED' : 'CONNECT_FAILED'));
    const socket = (this.socket = this.createSocket());
    socket.setNoDelay(true);
    socket.on('data', this.handleData);
    socket.on('error', this.handleError);
    socket.on('close', this.handleClose);
    return new Promise<void>((resolve, reject) => {
      const unsubscribe = this.onClose.listen(reject);
      socket.once('connect', () => {
        unsubscribe();
        this._state = 'connected';
        resolve();
      });
    });
  }

  public write(data: Uint8Array): boolean {
    const socket = this.socket;
    if (!socket || this._state !== 'connected') throw new TransportError(this._state === 'closed' ? 'CLOSED' : 'NOT_CONNECTED');
    return socket.write(data);
  }

  public close(): void {
    if (this._state === 'closed') return;
    this.terminate(new TransportError('CLOSED'));
    this.socket?.destroy();
  }

  protected terminate(error: TransportError): void {
    this._state = 'closed';
    this.onClose.emit(error);
  }

  private readonly handleData = (data: Buffer) => {
    this.onData.emit(data);
  };

  // 'close' always follows 'error', the error is reported from there.
  private readonly handleError = (error: Error) => {
    this.error = error;
  };

  private readonly handleClose = () => {
    if (this._state === 'closed') return;
    const code = this._state === 'unconnected' ? 'CONNECT_FAILED' : 'CONNECTION_LOST';
    this.terminate(new TransportError(code, this.error));
  };

  // ---------------------------------------------------------------- Printable

  public toString(tab?: string): string {
    return (
      'tcp' +
      printTree(tab, [
        () => `host: ${this.host}`,
        () => `port: ${this.port}`,
        () => `state: ${this._state}`,
      ])
    );
  }
}
