import {cmd as PING} from './PING';
import {cmd as ECHO} from './ECHO';
import {cmd as QUIT} from './QUIT';

export const commands = [PING, ECHO, QUIT];
