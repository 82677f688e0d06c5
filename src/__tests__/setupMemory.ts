import {RespMemoryServer} from '../server/RespMemoryServer';
import {TestSetup} from './types';

export const setupMemory =
  (chunkSize: number = 0): TestSetup =>
  async () => {
    const server = new RespMemoryServer();
    const client = await server.connectClient({chunkSize});
    return {client};
  };
