import {TestSetup} from '../../types';
import * as SET from './SET';
import * as GET from './GET';
import * as INCR from './INCR';
import * as DEL from './DEL';

export const run = (setup: TestSetup) => {
  describe('string commands', () => {
    SET.run(setup);
    GET.run(setup);
    INCR.run(setup);
    DEL.run(setup);
  });
};
