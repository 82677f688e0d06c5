import * as net from 'net';
import {RespEncoder} from '../resp/RespEncoder';
import {RespServerTcpConnection} from './connection/RespServerTcpConnection';
import {RespServer} from './RespServer';

/* tslint:disable no-console */

export interface RespTcpServerOpts {
  /** Port to listen on; 0 picks a free one. Defaults to 6379. */
  port?: number;
  /** Defaults to '127.0.0.1'. */
  host?: string;
}

export class RespTcpServer extends RespServer {
  private server?: net.Server;
  protected readonly encoder: RespEncoder;
  protected readonly sockets = new Set<net.Socket>();

  constructor(protected readonly opts: RespTcpServerOpts = {}) {
    super();
    this.encoder = new RespEncoder();
  }

  /** Resolves with the port the server listens on. */
  public start(): Promise<number> {
    const server = (this.server = net.createServer({
      allowHalfOpen: false,
      pauseOnConnect: false,
      noDelay: true,
    }));
    server.on('connection', this.handleConnection);
    server.on('error', this.handleError);
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.opts.port ?? 6379, this.opts.host ?? '127.0.0.1', () => {
        server.off('error', reject);
        const address = server.address();
        resolve(address && typeof address === 'object' ? address.port : 0);
      });
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    for (const socket of this.sockets) socket.destroy();
    return new Promise((resolve) => server.close(() => resolve()));
  }

  private readonly handleConnection = (socket: net.Socket) => {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
    const connection = new RespServerTcpConnection(socket, this.encoder);
    this.onConnection(connection);
  };

  private readonly handleError = (err: Error) => {
    console.error('server error', err);
  };
}
