import type {FanOut} from 'thingies/lib/fanout';
import type {Printable} from 'tree-dump/lib/types';
import type {TransportError} from '../errors';

export type RespSocketState = 'unconnected' | 'connected' | 'closed';

/**
 * Duplex byte stream a client talks over. Moves strictly through
 * `unconnected -> connected -> closed`; `closed` is terminal.
 */
export interface RespSocket extends Printable {
  readonly state: RespSocketState;
  readonly onData: FanOut<Uint8Array>;
  /** Emits exactly once, when the stream reaches the `closed` state. */
  readonly onClose: FanOut<TransportError>;
  connect(): Promise<void>;
  write(data: Uint8Array): boolean;
  close(): void;
}
