import {TcpConnection} from '../connection/TcpConnection';
import {RespClient} from './RespClient';
import type {RespClientOpts} from './RespClient';

export type ConnectOpts = Omit<RespClientOpts, 'socket'>;

/**
 * Opens a TCP connection and resolves with a client ready to send commands.
 *
 * ```ts
 * const client = await connect('localhost', 6379);
 * await client.set('first', '1');
 * await client.incr('first'); // 2
 * ```
 */
export const connect = async (host: string = 'localhost', port: number = 6379, opts: ConnectOpts = {}): Promise<RespClient> => {
  const client = new RespClient({...opts, socket: new TcpConnection({host, port})});
  await client.connect();
  return client;
};
