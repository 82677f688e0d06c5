import {Command} from '../../Command';
import {CommandError} from '../../../errors';
import {ascii, toUtf8} from '../../../util/buf';

const REG_INT = /^-?[0-9]+$/;
const INT64_MIN = -(BigInt(2) ** BigInt(63));
const INT64_MAX = BigInt(2) ** BigInt(63) - BigInt(1);

export const cmd = new Command('INCR', 2, (cmd, core) => {
  const key = cmd[1];
  const value = core.get(key);
  let current = BigInt(0);
  if (value !== undefined) {
    const str = toUtf8(value);
    if (!REG_INT.test(str)) throw new CommandError('ERR value is not an integer or out of range');
    current = BigInt(str);
    if (current < INT64_MIN || current > INT64_MAX) throw new CommandError('ERR value is not an integer or out of range');
  }
  if (current === INT64_MAX) throw new CommandError('ERR increment or decrement would overflow');
  const next = current + BigInt(1);
  core.set(key, ascii(String(next)));
  const num = Number(next);
  return Number.isSafeInteger(num) ? num : next;
});
