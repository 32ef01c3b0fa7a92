/**
 * LinkSession: one per device connection.
 *
 * Owns: transport, line framer, pending event queue.
 * Multiplexes three kinds of traffic over one ordered byte stream:
 *   - commands that wait for the device's next status response,
 *   - unsolicited events, queued until the caller collects them,
 *   - fire-and-forget lines (mouth animation) that never read anything.
 *
 * The line protocol carries no request IDs, so at most one command may be
 * awaiting a response at a time. That rule is enforced by the command token:
 * every response-awaiting path runs inside `exclusive()`. Fire-and-forget
 * writes go through `notify()`, which only takes the write lock.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { DeviceCommand, DeviceEvent, DeviceResponse } from '../types/protocol.js';
import { timeoutResponse } from '../types/protocol.js';
import type { Transport } from './transport.js';
import { LineFramer } from './lineFramer.js';
import { classifyLine, encodeCommand } from './messages.js';
import { AsyncLock } from './lock.js';
import { LinkError, isConnectionClosed } from './errors.js';
import { transferImage } from './imageTransfer.js';

export interface LinkSessionOptions {
  commandTimeoutMs: number;
  imageReadyTimeoutMs: number;
  imageDecodeTimeoutMs: number;
  /** Longest single wait for input while a response is outstanding. */
  pollSliceMs: number;
  maxQueuedEvents: number;
}

export const DEFAULT_LINK_SESSION_OPTIONS: LinkSessionOptions = {
  commandTimeoutMs: 5000,
  imageReadyTimeoutMs: 3000,
  imageDecodeTimeoutMs: 10_000,
  pollSliceMs: 50,
  maxQueuedEvents: 256,
};

/** Write side only. Handed to background writers so they cannot wait on a response. */
export interface CommandNotifier {
  notify(command: DeviceCommand): Promise<void>;
}

/** Capabilities of the current holder of the command token. Dead once the holder returns. */
export interface ExclusiveChannel {
  writeLine(command: DeviceCommand): Promise<void>;
  writeBytes(bytes: Uint8Array): Promise<void>;
  awaitResponse(timeoutMs: number): Promise<DeviceResponse>;
  /** Keep fire-and-forget writers off the stream until `task` settles. */
  holdWrites<T>(task: () => Promise<T>): Promise<T>;
}

interface Lease {
  released: boolean;
  holdingWrites: boolean;
}

export class LinkSession implements CommandNotifier {
  readonly options: LinkSessionOptions;

  private readonly framer = new LineFramer();
  private readonly commandToken = new AsyncLock();
  private readonly writeLock = new AsyncLock();
  private events: DeviceEvent[] = [];
  private overflowWarned = false;

  constructor(readonly transport: Transport, options: Partial<LinkSessionOptions> = {}) {
    this.options = { ...DEFAULT_LINK_SESSION_OPTIONS, ...options };
  }

  get description(): string {
    return this.transport.description;
  }

  // ── Response-awaiting primitives ─────────────────────────────

  /** Send one command and return the device's status response, or `{status:"timeout"}`. */
  sendCommand(command: DeviceCommand, timeoutMs: number = this.options.commandTimeoutMs): Promise<DeviceResponse> {
    return this.exclusive(async (channel) => {
      await channel.writeLine(command);
      return channel.awaitResponse(timeoutMs);
    });
  }

  /** Push a binary payload (JPEG) through the image handshake. */
  sendBinaryPayload(payload: Uint8Array): Promise<DeviceResponse> {
    return this.exclusive(channel => transferImage(channel, payload, {
      readyTimeoutMs: this.options.imageReadyTimeoutMs,
      decodeTimeoutMs: this.options.imageDecodeTimeoutMs,
    }));
  }

  /** Consume the status line a socket device sends right after accepting a connection. */
  awaitGreeting(timeoutMs: number): Promise<DeviceResponse> {
    return this.exclusive(channel => channel.awaitResponse(timeoutMs));
  }

  exclusive<T>(task: (channel: ExclusiveChannel) => Promise<T>): Promise<T> {
    return this.commandToken.run(async () => {
      const lease: Lease = { released: false, holdingWrites: false };
      try {
        return await task(this.openChannel(lease));
      } finally {
        lease.released = true;
      }
    });
  }

  // ── Fire-and-forget ──────────────────────────────────────────

  async notify(command: DeviceCommand): Promise<void> {
    const bytes = encodeCommand(command);
    await this.writeLock.run(() => this.transport.write(bytes));
  }

  // ── Events ───────────────────────────────────────────────────

  /**
   * Return and clear every event queued so far. Never waits. While a command
   * is in flight the input belongs to it, so only the queue is swapped.
   * Once the stream has closed, events already queued are still handed back;
   * the next call throws CONNECTION_CLOSED.
   */
  collectEvents(): DeviceEvent[] {
    if (!this.commandToken.locked) {
      try {
        this.pumpIdle();
      } catch (err) {
        if (this.events.length === 0 || !isConnectionClosed(err)) throw err;
      }
    }
    const events = this.events;
    this.events = [];
    this.overflowWarned = false;
    return events;
  }

  /** Let the device finish booting, then throw away its boot chatter unread. */
  async drainBoot(waitMs: number = 1500): Promise<void> {
    if (waitMs > 0) await sleep(waitMs);
    this.transport.discardInput();
    this.framer.reset();
  }

  async close(): Promise<void> {
    await this.transport.close();
  }

  // ── Internals ────────────────────────────────────────────────

  private openChannel(lease: Lease): ExclusiveChannel {
    const ensureLive = () => {
      if (lease.released) {
        throw new LinkError('CHANNEL_RELEASED', 'Exclusive channel used after its task returned');
      }
    };
    const write = async (bytes: Uint8Array) => {
      ensureLive();
      if (lease.holdingWrites) {
        await this.transport.write(bytes);
      } else {
        await this.writeLock.run(() => this.transport.write(bytes));
      }
    };

    return {
      writeLine: async (command) => {
        ensureLive();
        // Anything still buffered predates this command; keep events, drop stale responses
        this.pumpIdle();
        await write(encodeCommand(command));
      },
      writeBytes: async (bytes) => {
        if (bytes.length === 0) return;
        await write(bytes);
      },
      awaitResponse: (timeoutMs) => {
        ensureLive();
        return this.awaitResponse(timeoutMs);
      },
      holdWrites: async (task) => {
        ensureLive();
        if (lease.holdingWrites) return task();
        return this.writeLock.run(async () => {
          lease.holdingWrites = true;
          try {
            return await task();
          } finally {
            lease.holdingWrites = false;
          }
        });
      },
    };
  }

  /** First response line wins; events met on the way are queued. */
  private async awaitResponse(timeoutMs: number): Promise<DeviceResponse> {
    const deadline = Date.now() + timeoutMs;
    while (true) {
      this.framer.push(this.transport.readAvailable());
      for (let line = this.framer.next(); line !== null; line = this.framer.next()) {
        const parsed = classifyLine(line);
        if (parsed.kind === 'event') {
          this.enqueue(parsed.event);
        } else if (parsed.kind === 'response') {
          return parsed.response;
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) return timeoutResponse();
      await this.transport.waitForData(Math.min(remaining, this.options.pollSliceMs));
    }
  }

  /** Classify whatever is buffered when no command owns the input. */
  private pumpIdle(): void {
    this.framer.push(this.transport.readAvailable());
    for (const line of this.framer.drain()) {
      const parsed = classifyLine(line);
      if (parsed.kind === 'event') {
        this.enqueue(parsed.event);
      } else if (parsed.kind === 'response') {
        console.warn(`[link] Discarding stale response: ${line}`);
      }
    }
  }

  private enqueue(event: DeviceEvent): void {
    this.events.push(event);
    if (this.events.length > this.options.maxQueuedEvents) {
      this.events.shift();
      if (!this.overflowWarned) {
        this.overflowWarned = true;
        console.warn(`[link] Event queue full (${this.options.maxQueuedEvents}); dropping oldest events`);
      }
    }
  }
}
