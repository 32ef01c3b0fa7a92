import type { Transport } from '../link/transport.js';
import { TransportError } from '../link/errors.js';

type WriteHandler = (bytes: Buffer, transport: FakeTransport) => void;

/**
 * In-memory transport. Records every write call and lets a test script the
 * device side: `feed()` queues inbound bytes, `onWrite` answers writes.
 */
export class FakeTransport implements Transport {
  readonly description = 'fake';
  readonly writes: Buffer[] = [];
  onWrite: WriteHandler | null = null;
  /** Milliseconds each write takes before resolving. */
  writeDelayMs: number | ((writeIndex: number) => number) = 0;
  failWrites = false;

  private inbound: Buffer[] = [];
  private ended = false;
  private waiters = new Set<() => void>();

  feed(data: string | Uint8Array): void {
    this.inbound.push(typeof data === 'string' ? Buffer.from(data, 'utf-8') : Buffer.from(data));
    this.wake();
  }

  feedLines(...messages: object[]): void {
    this.feed(messages.map(m => JSON.stringify(m) + '\n').join(''));
  }

  end(): void {
    this.ended = true;
    this.wake();
  }

  /** Writes decoded as text lines, split on `\n`. */
  writtenLines(): string[] {
    return Buffer.concat(this.writes).toString('utf-8').split('\n').filter(l => l.length > 0);
  }

  async write(bytes: Uint8Array): Promise<number> {
    if (this.failWrites) throw new TransportError('WRITE_FAILED', 'fake write failure');
    const index = this.writes.length;
    const copy = Buffer.from(bytes);
    this.writes.push(copy);
    const delay = typeof this.writeDelayMs === 'function' ? this.writeDelayMs(index) : this.writeDelayMs;
    if (delay > 0) await new Promise(resolve => setTimeout(resolve, delay));
    this.onWrite?.(copy, this);
    return bytes.length;
  }

  readAvailable(): Buffer {
    if (this.inbound.length > 0) {
      const data = Buffer.concat(this.inbound);
      this.inbound = [];
      return data;
    }
    if (this.ended) throw new TransportError('CONNECTION_CLOSED', 'fake: connection closed');
    return Buffer.alloc(0);
  }

  waitForData(timeoutMs: number): Promise<void> {
    if (this.inbound.length > 0 || this.ended || timeoutMs <= 0) return Promise.resolve();
    return new Promise((resolve) => {
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
    this.inbound = [];
  }

  async close(): Promise<void> {
    this.end();
  }

  private wake() {
    for (const waiter of [...this.waiters]) waiter();
  }
}
