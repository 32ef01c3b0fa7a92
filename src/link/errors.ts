export type LinkErrorCode =
  | 'OPEN_FAILED'
  | 'CONNECTION_CLOSED'
  | 'WRITE_FAILED'
  | 'CHANNEL_RELEASED';

/** Failure of the link itself. Timeouts are not errors; they come back as a `timeout` response. */
export class LinkError extends Error {
  readonly code: LinkErrorCode;

  constructor(code: LinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkError';
    this.code = code;
  }
}

/** Open, connect, read or write failure on the byte stream. Fatal to the session. */
export class TransportError extends LinkError {
  constructor(code: Exclude<LinkErrorCode, 'CHANNEL_RELEASED'>, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'TransportError';
  }
}

export function isConnectionClosed(err: unknown): boolean {
  return err instanceof TransportError && err.code === 'CONNECTION_CLOSED';
}
