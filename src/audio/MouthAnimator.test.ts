import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { animateMouth, mouthCommand } from './MouthAnimator.js';
import type { CommandNotifier } from '../link/LinkSession.js';
import type { DeviceCommand } from '../types/protocol.js';

/** Records every mouth value with the time it was sent. `beforeSend` sees the call index. */
class RecordingNotifier implements CommandNotifier {
  readonly sent: { open: unknown; at: number }[] = [];
  private calls = 0;

  constructor(
    private readonly clock: () => number = () => performance.now(),
    private readonly beforeSend: (index: number) => Promise<void> | void = () => undefined,
  ) {}

  async notify(command: DeviceCommand): Promise<void> {
    await this.beforeSend(this.calls++);
    this.sent.push({ open: command.open, at: this.clock() });
  }

  values(): unknown[] {
    return this.sent.map(s => s.open);
  }
}

describe('animateMouth', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('absorbs send latency into the sleep so the total matches the frame count', async () => {
    let t = 0;
    const latencies = [10, 5, 40, 0];
    const notifier = new RecordingNotifier(() => t, (i) => {
      t += latencies[i] ?? 0;
    });
    const sleeps: number[] = [];

    const report = await animateMouth(notifier, [0.2, 0.4, 0.6, 0.8], {
      frameMs: 30,
      now: () => t,
      sleep: async (ms) => {
        sleeps.push(ms);
        t += ms;
      },
    });

    // the overrun on frame 2 skips one sleep instead of pushing later frames back
    expect(sleeps).toEqual([20, 25, 20]);
    expect(notifier.sent.map(s => s.at)).toEqual([10, 35, 100, 100, 120]);
    expect(notifier.values()).toEqual([0.2, 0.4, 0.6, 0.8, 0]);
    expect(report).toEqual({ framesSent: 4, cancelled: false, elapsedMs: 120 });
  });

  it('stays within two frames of K×frameMs on real timers with uneven send latency', async () => {
    const frames = Array.from({ length: 15 }, (_, i) => 0.1 + (i % 5) * 0.2);
    const notifier = new RecordingNotifier(undefined, async (i) => {
      await new Promise(resolve => setTimeout(resolve, i % 3 === 0 ? 12 : 1));
    });

    const started = performance.now();
    await animateMouth(notifier, frames, { frameMs: 30 });
    const closedAt = notifier.sent[notifier.sent.length - 1].at - started;

    expect(notifier.sent).toHaveLength(16);
    expect(Math.abs(closedAt - 15 * 30)).toBeLessThanOrEqual(60);
  });

  it('sends exactly one closing frame after a cancel', async () => {
    const controller = new AbortController();
    const notifier = new RecordingNotifier(undefined, (i) => {
      if (i === 2) controller.abort();
    });

    const report = await animateMouth(notifier, [0.5, 0.6, 0.7, 0.8, 0.9, 1], {
      frameMs: 5,
      signal: controller.signal,
    });

    expect(notifier.values()).toEqual([0.5, 0.6, 0.7, 0]);
    expect(report.cancelled).toBe(true);
    expect(report.framesSent).toBe(3);
  });

  it('still closes the mouth when cancelled before the first frame', async () => {
    const notifier = new RecordingNotifier();

    const report = await animateMouth(notifier, [0.5, 0.5], { frameMs: 5, signal: AbortSignal.abort() });

    expect(notifier.values()).toEqual([0]);
    expect(report).toMatchObject({ framesSent: 0, cancelled: true });
  });

  it('keeps going when single frames fail to send', async () => {
    const notifier = new RecordingNotifier(undefined, (i) => {
      if (i === 1) throw new Error('serial glitch');
    });
    let t = 0;

    const report = await animateMouth(notifier, [0.3, 0.4, 0.5], {
      frameMs: 30,
      now: () => t,
      sleep: async (ms) => {
        t += ms;
      },
    });

    expect(report.framesSent).toBe(3);
    expect(notifier.values()).toEqual([0.3, 0.5, 0]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('sends only the closing frame for an empty envelope', async () => {
    const notifier = new RecordingNotifier();
    let t = 0;

    const report = await animateMouth(notifier, [], { now: () => t, sleep: async (ms) => { t += ms; } });

    expect(report).toEqual({ framesSent: 0, cancelled: false, elapsedMs: 0 });
    expect(notifier.values()).toEqual([0]);
  });
});

describe('mouthCommand', () => {
  it('rounds openness to two decimals', () => {
    expect(mouthCommand(0.456)).toEqual({ cmd: 'mouth', open: 0.46 });
    expect(mouthCommand(0)).toEqual({ cmd: 'mouth', open: 0 });
  });
});
