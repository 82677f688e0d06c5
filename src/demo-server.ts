// npm run build && node dist/demo-server.js

import {RespTcpServer} from './server/RespTcpServer';

/* tslint:disable no-console */

const main = async () => {
  const port = Number(process.env.RESP_PORT ?? 6379);
  const server = new RespTcpServer({port});
  const actual = await server.start();
  console.log(`listening on 127.0.0.1:${actual}`);
  process.once('SIGINT', () => {
    server.stop().then(() => process.exit(0), (err) => {
      console.error(err);
      process.exit(1);
    });
  });
};

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
