// npm run build && node dist/demo-client.js

import {connect} from './client/connect';
import {toUtf8} from './util/buf';

/* tslint:disable no-console */

const main = async () => {
  const host = process.env.RESP_HOST ?? 'localhost';
  const port = Number(process.env.RESP_PORT ?? 6379);
  const client = await connect(host, port, {timeout: 5000});
  client.onError.listen((error) => console.error('connection failed', error));
  console.log(client + '');
  console.log('SET first 1 ->', await client.set('first', '1'));
  console.log('SET third 3 ->', await client.send('SET', 'third', '3'));
  const value = await client.get('first');
  console.log('GET first ->', value === null ? null : toUtf8(value));
  console.log('INCR first ->', await client.incr('first'));
  console.log('GET missing ->', await client.get('missing'));
  await client.quit();
};

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
