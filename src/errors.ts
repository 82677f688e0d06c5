export type TransportErrorCode =
  | 'NOT_CONNECTED'
  | 'CLOSED'
  | 'CONNECT_FAILED'
  | 'CONNECTION_LOST'
  | 'TIMEOUT'
  | 'ABORTED';

/**
 * The byte stream is gone, or is no longer trusted: connection refused,
 * reset, closed while a reply was expected, timed out or cancelled. Always
 * fatal to the connection, there is no automatic recovery.
 */
export class TransportError extends Error {
  public readonly name: string = 'TransportError';

  constructor(
    public readonly code: TransportErrorCode,
    public readonly cause?: unknown,
  ) {
    super(cause instanceof Error ? `${code}: ${cause.message}` : code);
  }
}

/**
 * Malformed wire data: an unknown tag, a number that does not parse, a bulk
 * string without its terminator, or a reply nobody asked for. The decoder
 * position can no longer be trusted, so the connection is failed.
 */
export class ProtocolError extends Error {
  public readonly name: string = 'ProtocolError';
}

export class UnexpectedTagError extends ProtocolError {
  constructor(
    /** The offending tag byte. */
    public readonly tag: number,
    /** Up to 100 bytes that followed the tag, as text. */
    public readonly snippet: string,
  ) {
    super(`Unexpected RESP tag ${JSON.stringify(String.fromCharCode(tag))} before ${JSON.stringify(snippet)}.`);
  }
}

/**
 * A well-formed `-` reply: the server refused this one command. The
 * connection stays usable.
 */
export class CommandError extends Error {
  public readonly name: string = 'CommandError';

  /** Leading word of the message, e.g. "ERR" or "WRONGTYPE". */
  public get code(): string {
    const msg = this.message;
    const space = msg.indexOf(' ');
    return space < 0 ? msg : msg.slice(0, space);
  }
}
