import { createConnection, type Socket } from 'node:net';
import { DuplexTransport } from './transport.js';
import { TransportError } from './errors.js';

export const DEFAULT_LINK_PORT = 7777;
export const DEFAULT_CONNECT_TIMEOUT_MS = 2000;

export class SocketTransport extends DuplexTransport {
  readonly description: string;

  private constructor(socket: Socket, host: string, port: number) {
    super(socket);
    this.description = `tcp ${host}:${port}`;
  }

  /**
   * Connect with a bounded handshake. Nagle is disabled: command frames are
   * a few dozen bytes and the animation stream sends one every frame.
   */
  static connect(
    host: string,
    port: number = DEFAULT_LINK_PORT,
    timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
  ): Promise<SocketTransport> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });

      const fail = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(new TransportError('OPEN_FAILED', `Cannot connect to ${host}:${port}: ${err.message}`, { cause: err }));
      };
      const timer = setTimeout(() => fail(new Error(`no answer within ${timeoutMs}ms`)), timeoutMs);

      socket.once('error', fail);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', fail);
        socket.setNoDelay(true);
        socket.setKeepAlive(true);
        resolve(new SocketTransport(socket, host, port));
      });
    });
  }
}
