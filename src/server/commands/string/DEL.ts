import {Command} from '../../Command';

export const cmd = new Command('DEL', -2, (cmd, core) => {
  const [, ...keys] = cmd;
  let deleted = 0;
  for (const key of keys) if (core.del(key)) deleted++;
  return deleted;
});
