import {utf8} from '../../../util/buf';
import {getKey} from '../../keys';
import {TestSetup} from '../../types';

export const run = (setup: TestSetup) => {
  describe('GET', () => {
    test('missing key returns null', async () => {
      const {client} = await setup();
      const res = await client.get(getKey('missing_key'));
      expect(res).toBe(null);
    });

    test('can get a key', async () => {
      const {client} = await setup();
      const key = getKey('fetch_existing_key');
      await client.set(key, '42');
      expect(await client.get(key)).toEqual(utf8`42`);
    });

    test('can decode the value as UTF-8', async () => {
      const {client} = await setup();
      const key = getKey('value_with_emoji');
      await client.set(key, '😅');
      const res = await client.cmd(['GET', key], {utf8Res: true});
      expect(res).toBe('😅');
    });

    test('key can contain UTF-8 characters', async () => {
      const {client} = await setup();
      const key = getKey('key_with_emoji_😛');
      await client.set(key, '42');
      const res = await client.get(Buffer.from(key));
      expect(res).toEqual(utf8`42`);
    });

    test('values are binary-safe', async () => {
      const {client} = await setup();
      const key = getKey('binary_value');
      const value = new Uint8Array([0, 13, 10, 36, 45, 42, 255, 13, 10]);
      await client.set(key, value);
      expect(await client.get(key)).toEqual(value);
    });
  });
};
