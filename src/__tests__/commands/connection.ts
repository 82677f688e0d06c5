import {CommandError} from '../../errors';
import {utf8} from '../../util/buf';
import {TestSetup} from '../types';

export const run = (setup: TestSetup) => {
  describe('connection commands', () => {
    test('PING replies with a simple string', async () => {
      const {client} = await setup();
      expect(await client.send('PING')).toBe('PONG');
    });

    test('PING with a message replies with it as a bulk string', async () => {
      const {client} = await setup();
      expect(await client.send('PING', 'hello')).toEqual(utf8`hello`);
    });

    test('ECHO returns binary arguments unchanged', async () => {
      const {client} = await setup();
      const payload = new Uint8Array([13, 10, 0, 43, 58, 13]);
      expect(await client.send('ECHO', payload)).toEqual(payload);
    });

    test('command names are case-insensitive', async () => {
      const {client} = await setup();
      expect(await client.send('ping')).toBe('PONG');
    });

    test('an unknown command is a command error, the connection stays usable', async () => {
      const {client} = await setup();
      const promise = client.send('NOPE', 'x');
      await expect(promise).rejects.toBeInstanceOf(CommandError);
      await expect(promise).rejects.toThrow("ERR unknown command 'NOPE'");
      expect(await client.send('PING')).toBe('PONG');
    });
  });
};
