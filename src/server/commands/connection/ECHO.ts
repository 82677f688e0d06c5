import {Command} from '../../Command';

export const cmd = new Command('ECHO', 2, (cmd) => cmd[1]);
