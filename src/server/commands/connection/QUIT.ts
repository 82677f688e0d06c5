import {Command} from '../../Command';

export const cmd = new Command('QUIT', 1, (cmd, core, connection) => {
  connection.send('OK');
  connection.close();
  return undefined;
});
