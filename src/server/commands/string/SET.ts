import {Command} from '../../Command';

export const cmd = new Command('SET', 3, (cmd, core) => {
  core.set(cmd[1], cmd[2]);
  return 'OK';
});
