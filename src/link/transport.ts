import type { Duplex } from 'node:stream';
import { TransportError } from './errors.js';

/**
 * Ordered, reliable byte stream to the device.
 *
 * Reads never block: `readAvailable` hands back whatever arrived since the
 * last call, and `waitForData` parks the caller for at most one short slice.
 */
export interface Transport {
  readonly description: string;
  write(bytes: Uint8Array): Promise<number>;
  /** Buffered input, possibly empty. Throws CONNECTION_CLOSED once the stream ended and nothing is left. */
  readAvailable(): Buffer;
  waitForData(timeoutMs: number): Promise<void>;
  discardInput(): void;
  close(): Promise<void>;
}

/** Shared plumbing for transports backed by a Node duplex stream (serial port, TCP socket). */
export abstract class DuplexTransport implements Transport {
  abstract readonly description: string;

  private chunks: Buffer[] = [];
  private closed = false;
  private failure: Error | null = null;
  private waiters = new Set<() => void>();

  protected constructor(protected readonly stream: Duplex) {
    stream.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.wake();
    });
    stream.on('error', (err: Error) => {
      this.failure = err;
      this.closed = true;
      this.wake();
    });
    stream.on('close', () => {
      this.closed = true;
      this.wake();
    });
    stream.on('end', () => {
      this.closed = true;
      this.wake();
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  async write(bytes: Uint8Array): Promise<number> {
    if (this.closed) {
      throw new TransportError('WRITE_FAILED', `${this.description}: write on closed stream`, { cause: this.failure ?? undefined });
    }
    if (bytes.length === 0) return 0;

    await new Promise<void>((resolve, reject) => {
      this.stream.write(bytes, (err) => {
        if (err) {
          reject(new TransportError('WRITE_FAILED', `${this.description}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
    await this.flushWrites();
    return bytes.length;
  }

  readAvailable(): Buffer {
    if (this.chunks.length > 0) {
      const data = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
      this.chunks = [];
      return data;
    }
    if (this.closed) {
      const reason = this.failure ? this.failure.message : 'connection closed';
      throw new TransportError('CONNECTION_CLOSED', `${this.description}: ${reason}`, { cause: this.failure ?? undefined });
    }
    return Buffer.alloc(0);
  }

  waitForData(timeoutMs: number): Promise<void> {
    if (this.chunks.length > 0 || this.closed || timeoutMs <= 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.add(done);
    });
  }

  discardInput(): void {
    this.chunks = [];
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await new Promise<void>((resolve) => {
      this.stream.once('close', () => resolve());
      this.stream.destroy();
    });
  }

  /** Hook for transports that must push written bytes onto the wire before reporting success. */
  protected async flushWrites(): Promise<void> {}

  private wake() {
    for (const waiter of [...this.waiters]) waiter();
  }
}
