import {Command} from '../../Command';

export const cmd = new Command('PING', -1, (cmd) => {
  if (cmd.length > 2) throw new Error("wrong number of arguments for 'ping' command");
  return cmd.length === 2 ? cmd[1] : 'PONG';
});
