import {FanOut} from 'thingies/lib/fanout';
import {printTree} from 'tree-dump/lib/printTree';
import {RespEncoder} from '../resp/RespEncoder';
import {RespDecoder} from '../resp/RespDecoder';
import {CommandError, ProtocolError, TransportError} from '../errors';
import {withTimeout} from '../util/timeout';
import {ascii} from '../util/buf';
import {RespCall} from './RespCall';
import type {Printable} from 'tree-dump/lib/types';
import type {RespSocket, RespSocketState} from '../connection/types';
import type {RespInteger, RespReply} from '../resp/types';
import type {Arg, Cmd} from '../types';

const GET = ascii`GET`;
const SET = ascii`SET`;
const INCR = ascii`INCR`;
const QUIT = ascii`QUIT`;

export interface RespClientOpts {
  socket: RespSocket;
  encoder?: RespEncoder;
  decoder?: RespDecoder;
  /** Default milliseconds to wait for a reply; 0 waits indefinitely. Defaults to 0. */
  timeout?: number;
}

export type CmdOpts = Partial<Pick<RespCall, 'utf8Res' | 'timeout' | 'signal'>>;

/**
 * Client for one connection to one server. Commands may be issued
 * concurrently: each request is written as a whole frame and the call is
 * queued, replies settle queued calls in order.
 */
export class RespClient implements Printable {
  protected readonly socket: RespSocket;
  public readonly timeout: number;

  private _onDataUnsub?: () => void;
  private _onCloseUnsub?: () => void;

  constructor(opts: RespClientOpts) {
    const socket = (this.socket = opts.socket);
    this.encoder = opts.encoder ?? new RespEncoder();
    this.decoder = opts.decoder ?? new RespDecoder();
    this.timeout = opts.timeout ?? 0;
    this._onDataUnsub = socket.onData.listen(this.handleData);
    this._onCloseUnsub = socket.onClose.listen(this.handleClose);
  }

  public get state(): RespSocketState {
    return this.socket.state;
  }

  // ------------------------------------------------------------------- Events

  /** Fatal errors: the connection is closed right after they are emitted. */
  public readonly onError = new FanOut<TransportError | ProtocolError>();

  // ------------------------------------------------------------ Socket writes

  protected readonly encoder: RespEncoder;

  // ------------------------------------------------------------- Socket reads

  protected readonly decoder: RespDecoder;
  /** Calls awaiting a reply, in the order their requests were written. */
  protected readonly responses: RespCall[] = [];

  private readonly handleData = (data: Uint8Array) => {
    const decoder = this.decoder;
    const responses = this.responses;
    try {
      decoder.push(data);
      while (true) {
        const call = responses[0];
        decoder.utf8 = !!call && call.utf8Res;
        const reply = decoder.read();
        if (reply === undefined) break;
        if (!call) throw new ProtocolError('Received a reply no command is waiting for.');
        responses.shift();
        if (reply instanceof CommandError) call.response.reject(reply);
        else call.response.resolve(reply);
      }
    } catch (error) {
      this.fail(error instanceof ProtocolError ? error : new ProtocolError(String(error)));
    }
  };

  private readonly handleClose = (error: TransportError) => {
    this._onDataUnsub?.();
    this._onCloseUnsub?.();
    this.decoder.reset();
    const responses = this.responses.splice(0);
    for (const call of responses) call.response.reject(error);
  };

  /** Rejects every pending call with `error` and closes the connection. */
  protected fail(error: TransportError | ProtocolError): void {
    const responses = this.responses.splice(0);
    for (const call of responses) call.response.reject(error);
    this.onError.emit(error);
    this.socket.close();
  }

  // -------------------------------------------------------------- Life cycles

  public connect(): Promise<void> {
    return this.socket.connect();
  }

  public close(): void {
    this.socket.close();
  }

  // -------------------------------------------------------- Command execution

  public async call(call: RespCall): Promise<RespReply> {
    const socket = this.socket;
    const state = socket.state;
    if (state !== 'connected') throw new TransportError(state === 'closed' ? 'CLOSED' : 'NOT_CONNECTED');
    const signal = call.signal;
    if (signal && signal.aborted) throw new TransportError('ABORTED');
    const buf = this.encoder.encodeCmd(call.args);
    this.responses.push(call);
    socket.write(buf);
    let promise = call.response.promise;
    const timeout = call.timeout ?? this.timeout;
    if (timeout > 0) promise = withTimeout(timeout, promise, (error) => this.fail(error));
    if (signal) {
      const onAbort = () => this.fail(new TransportError('ABORTED'));
      signal.addEventListener('abort', onAbort, {once: true});
      const cleanup = () => signal.removeEventListener('abort', onAbort);
      promise.then(cleanup, cleanup);
    }
    return promise;
  }

  /** Sends a command and resolves with its reply; a `-` reply rejects with {@link CommandError}. */
  public async cmd(args: Cmd, opts?: CmdOpts): Promise<RespReply> {
    const call = new RespCall(args);
    if (opts) {
      if (opts.utf8Res) call.utf8Res = true;
      if (opts.timeout !== undefined) call.timeout = opts.timeout;
      if (opts.signal) call.signal = opts.signal;
    }
    return this.call(call);
  }

  public send(...args: Cmd): Promise<RespReply> {
    return this.cmd(args);
  }

  // -------------------------------------------------------- Built-in commands

  public async get(key: Arg): Promise<Uint8Array | null> {
    const reply = await this.cmd([GET, key]);
    if (reply === null || reply instanceof Uint8Array) return reply;
    throw this.unexpected('GET', reply);
  }

  public async set(key: Arg, value: Arg): Promise<string> {
    const reply = await this.cmd([SET, key, value]);
    if (typeof reply === 'string') return reply;
    throw this.unexpected('SET', reply);
  }

  public async incr(key: Arg): Promise<RespInteger> {
    const reply = await this.cmd([INCR, key]);
    if (typeof reply === 'number' || typeof reply === 'bigint') return reply;
    throw this.unexpected('INCR', reply);
  }

  /** Asks the server to close the connection, then closes it locally. */
  public async quit(): Promise<void> {
    try {
      await this.cmd([QUIT]);
    } finally {
      this.close();
    }
  }

  protected unexpected(cmd: string, reply: RespReply): ProtocolError {
    const type = reply instanceof Uint8Array ? 'bulk string' : Array.isArray(reply) ? 'array' : typeof reply;
    const error = new ProtocolError(`Unexpected ${type} reply to ${cmd}.`);
    this.fail(error);
    return error;
  }

  // ---------------------------------------------------------------- Printable

  public toString(tab?: string): string {
    return (
      'client' +
      printTree(tab, [
        () => `pending: ${this.responses.length}`,
        (tab) => this.socket.toString(tab),
      ])
    );
  }
}
