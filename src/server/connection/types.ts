import type {ParsedCmd} from '../../types';
import type {RespReply} from '../../resp/types';

export interface RespServerConnection {
  oncmd: (cmd: ParsedCmd) => void;
  send(reply: RespReply): void;
  /** Closes the connection once the replies sent so far are delivered. */
  close(): void;
}
