import {Defer} from 'thingies/lib/Defer';
import type {Cmd} from '../types';
import type {RespReply} from '../resp/types';

/**
 * Represents a single request/reply command call.
 */
export class RespCall {
  /**
   * Whether to decode bulk strings in the reply as UTF-8 text.
   */
  public utf8Res: boolean = false;

  /**
   * Milliseconds to wait for the reply; 0 waits indefinitely. When unset,
   * the client default applies.
   */
  public timeout?: number = undefined;

  /**
   * Cancels the call. Once the request is written, cancelling fails the
   * whole connection, as the reply can no longer be told apart.
   */
  public signal?: AbortSignal = undefined;

  public readonly response = new Defer<RespReply>();

  constructor(public readonly args: Cmd) {}
}
