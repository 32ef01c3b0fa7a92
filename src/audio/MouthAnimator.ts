import { setTimeout as sleep } from 'node:timers/promises';
import type { MouthCommand } from '../types/protocol.js';
import type { CommandNotifier } from '../link/LinkSession.js';

export interface AnimateOptions {
  frameMs?: number;
  signal?: AbortSignal;
  /** Monotonic clock in ms. */
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface AnimationReport {
  framesSent: number;
  cancelled: boolean;
  elapsedMs: number;
}

export function mouthCommand(openness: number): MouthCommand {
  return { cmd: 'mouth', open: Math.round(openness * 100) / 100 };
}

/**
 * Play an envelope on the face as one fire-and-forget mouth command per frame.
 *
 * Deadlines are absolute (`start + (i+1)·frameMs`) and the send happens before
 * the sleep is computed, so send latency eats into the sleep instead of
 * accumulating. The abort signal is checked once per frame. Whatever ends the
 * loop, one closing `open: 0` frame goes out last.
 */
export async function animateMouth(
  notifier: CommandNotifier,
  frames: readonly number[],
  options: AnimateOptions = {},
): Promise<AnimationReport> {
  const frameMs = options.frameMs ?? 30;
  const now = options.now ?? (() => performance.now());
  const wait = options.sleep ?? sleep;
  const { signal } = options;

  let sendFailed = false;
  const send = async (openness: number) => {
    try {
      await notifier.notify(mouthCommand(openness));
    } catch (err) {
      // A dropped frame is cosmetic; keep the animation going
      if (!sendFailed) {
        sendFailed = true;
        console.warn(`[mouth] Frame send failed, continuing: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  };

  console.log(`[mouth] Animating ${frames.length} frames over ${(frames.length * frameMs / 1000).toFixed(2)}s`);
  const start = now();
  let framesSent = 0;
  let cancelled = false;

  for (let i = 0; i < frames.length; i++) {
    if (signal?.aborted) {
      cancelled = true;
      break;
    }

    await send(frames[i]);
    framesSent++;

    const sleepMs = start + (i + 1) * frameMs - now();
    if (sleepMs > 0) await wait(sleepMs);
  }

  await send(0);
  const elapsedMs = now() - start;
  console.log(`[mouth] Animation ${cancelled ? 'cancelled' : 'complete'} (${(elapsedMs / 1000).toFixed(2)}s actual)`);
  return { framesSent, cancelled, elapsedMs };
}
