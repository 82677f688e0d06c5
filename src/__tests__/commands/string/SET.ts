import {CommandError} from '../../../errors';
import {utf8} from '../../../util/buf';
import {getKey} from '../../keys';
import {TestSetup} from '../../types';

export const run = (setup: TestSetup) => {
  describe('SET', () => {
    test('can set a key', async () => {
      const {client} = await setup();
      const res = await client.set(getKey('set'), 'bar');
      expect(res).toBe('OK');
    });

    test('overwrites an existing value', async () => {
      const {client} = await setup();
      const key = getKey('set_overwrite');
      await client.set(key, 'first');
      await client.set(key, 'second');
      expect(await client.get(key)).toEqual(utf8`second`);
    });

    test('can store an empty value', async () => {
      const {client} = await setup();
      const key = getKey('set_empty');
      await client.set(key, '');
      expect(await client.get(key)).toEqual(new Uint8Array(0));
    });

    test('numbers are sent as their decimal text', async () => {
      const {client} = await setup();
      const key = getKey('set_number');
      await client.set(key, -12.5);
      expect(await client.get(key)).toEqual(utf8`-12.5`);
    });

    test('wrong number of arguments is a command error', async () => {
      const {client} = await setup();
      const promise = client.cmd(['SET', getKey('set_arity')]);
      await expect(promise).rejects.toBeInstanceOf(CommandError);
      await expect(promise).rejects.toThrow("ERR wrong number of arguments for 'set' command");
      expect(await client.cmd(['PING'])).toBe('PONG');
    });
  });
};
