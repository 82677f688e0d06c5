import {cmd as GET} from './GET';
import {cmd as SET} from './SET';
import {cmd as INCR} from './INCR';
import {cmd as DEL} from './DEL';

export const commands = [GET, SET, INCR, DEL];
