import {FanOut} from 'thingies/lib/fanout';
import {printTree} from 'tree-dump/lib/printTree';
import {RespEncoder} from '../resp/RespEncoder';
import {RespClient} from '../client/RespClient';
import {CommandError, TransportError} from '../errors';
import {RespServer} from './RespServer';
import {CommandReader} from './connection/CommandReader';
import type {RespClientOpts} from '../client/RespClient';
import type {RespSocket, RespSocketState} from '../connection/types';
import type {RespReply} from '../resp/types';
import type {ParsedCmd} from '../types';
import type {RespServerConnection} from './connection/types';

export interface MemorySocketOpts {
  /**
   * Splits every reply into chunks of this many bytes before delivering
   * them, to exercise fragmented reads. 0 delivers replies whole.
   */
  chunkSize?: number;
}

/**
 * Server end of an in-process connection. Replies are encoded to RESP bytes
 * and delivered to the client socket on a later tick, in order.
 */
class MemoryServerConnection implements RespServerConnection {
  public oncmd: (cmd: ParsedCmd) => void = () => {};

  constructor(
    protected readonly client: MemorySocket,
    protected readonly encoder: RespEncoder,
  ) {}

  public send(reply: RespReply): void {
    const buf = this.encoder.encode(reply);
    setImmediate(() => this.client.receive(buf));
  }

  public close(): void {
    setImmediate(() => this.client.hangUp());
  }
}

/** Client end of an in-process connection, speaks real RESP bytes. */
export class MemorySocket implements RespSocket {
  public readonly onData = new FanOut<Uint8Array>();
  public readonly onClose = new FanOut<TransportError>();
  /** Every request written so far, for inspection in tests. */
  public readonly written: Uint8Array[] = [];
  protected readonly reader = new CommandReader();
  protected readonly chunkSize: number;
  protected readonly connection: MemoryServerConnection;
  private _state: RespSocketState = 'unconnected';

  constructor(
    protected readonly server: RespServer,
    encoder: RespEncoder,
    {chunkSize = 0}: MemorySocketOpts = {},
  ) {
    this.chunkSize = chunkSize;
    this.connection = new MemoryServerConnection(this, encoder);
  }

  public get state(): RespSocketState {
    return this._state;
  }

  public async connect(): Promise<void> {
    if (this._state !== 'unconnected') throw new TransportError(this._state === 'closed' ? 'CLOSED' : 'CONNECT_FAILED');
    this._state = 'connected';
    this.server.onConnection(this.connection);
  }

  public write(data: Uint8Array): boolean {
    if (this._state !== 'connected') throw new TransportError(this._state === 'closed' ? 'CLOSED' : 'NOT_CONNECTED');
    const buf = data.slice();
    this.written.push(buf);
    setImmediate(() => {
      if (this._state !== 'connected') return;
      try {
        this.reader.push(buf, (cmd) => this.connection.oncmd(cmd));
      } catch (err) {
        this.connection.send(err instanceof CommandError ? err : new CommandError('ERR Protocol error'));
        this.connection.close();
      }
    });
    return true;
  }

  public close(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.onClose.emit(new TransportError('CLOSED'));
  }

  /** Delivers server bytes to the client. */
  public receive(buf: Uint8Array): void {
    if (this._state !== 'connected') return;
    const chunkSize = this.chunkSize;
    if (chunkSize <= 0) return this.onData.emit(buf);
    for (let i = 0; i < buf.length && this._state === 'connected'; i += chunkSize)
      this.onData.emit(buf.subarray(i, i + chunkSize));
  }

  /** Closes the connection from the server side. */
  public hangUp(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.onClose.emit(new TransportError('CONNECTION_LOST'));
  }

  // ---------------------------------------------------------------- Printable

  public toString(tab?: string): string {
    return 'memory' + printTree(tab, [() => `chunkSize: ${this.chunkSize}`, () => `state: ${this._state}`]);
  }
}

export type ConnectMemoryClientOpts = MemorySocketOpts & Omit<RespClientOpts, 'socket'>;

/**
 * Keyspace held in process memory, reachable through {@link MemorySocket}
 * connections. Used by the tests; every byte still goes through the RESP
 * encoder and decoder on both ends.
 */
export class RespMemoryServer extends RespServer {
  protected readonly encoder = new RespEncoder();

  public createSocket(opts?: MemorySocketOpts): MemorySocket {
    return new MemorySocket(this, this.encoder, opts);
  }

  /** Creates a connected client. */
  public async connectClient({chunkSize, ...opts}: ConnectMemoryClientOpts = {}): Promise<RespClient> {
    const client = new RespClient({...opts, socket: this.createSocket({chunkSize})});
    await client.connect();
    return client;
  }
}
