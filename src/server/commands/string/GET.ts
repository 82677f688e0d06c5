import {Command} from '../../Command';

export const cmd = new Command('GET', 2, (cmd, core) => {
  const value = core.get(cmd[1]);
  return value === undefined ? null : value;
});
