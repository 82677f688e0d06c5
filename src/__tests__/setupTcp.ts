import {connect} from '../client/connect';
import {RespTcpServer} from '../server/RespTcpServer';
import type {RespClient} from '../client/RespClient';
import type {TestSetup} from './types';

/** Serves the in-memory runtime on a free loopback port for one test file. */
export const setupTcp = (): TestSetup => {
  const server = new RespTcpServer({port: 0});
  const clients: RespClient[] = [];
  let port = 0;

  beforeAll(async () => {
    port = await server.start();
  });

  afterAll(async () => {
    for (const client of clients) client.close();
    await server.stop();
  });

  return async () => {
    const client = await connect('127.0.0.1', port);
    clients.push(client);
    return {client};
  };
};
