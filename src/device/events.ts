import { setTimeout as sleep } from 'node:timers/promises';
import type { DeviceEvent } from '../types/protocol.js';
import type { LinkSession } from '../link/LinkSession.js';

export interface TouchRegion {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** The on-screen button drawn along the bottom edge of streamed frames. */
export const DEFAULT_BUTTON_REGION: TouchRegion = { left: 150, top: 400, right: 330, bottom: 455 };

/**
 * Physical presses always count; a touch counts inside `region` (edges
 * inclusive), or anywhere when `touchAnywhere` is set.
 */
export function isButtonPress(
  event: DeviceEvent,
  region: TouchRegion = DEFAULT_BUTTON_REGION,
  touchAnywhere = false,
): boolean {
  if (event.event === 'button' || event.event === 'button_down') return true;
  if (event.event !== 'touch') return false;
  if (touchAnywhere) return true;

  const { x, y } = event;
  if (typeof x !== 'number' || typeof y !== 'number') return false;
  return x >= region.left && x <= region.right && y >= region.top && y <= region.bottom;
}

export interface PollEventsOptions {
  intervalMs?: number;
  signal?: AbortSignal;
}

/** Yield device events as they are collected, until the signal aborts. */
export async function* pollEvents(
  link: LinkSession,
  options: PollEventsOptions = {},
): AsyncGenerator<DeviceEvent> {
  const intervalMs = options.intervalMs ?? 20;
  while (!options.signal?.aborted) {
    for (const event of link.collectEvents()) yield event;
    try {
      await sleep(intervalMs, undefined, { signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) return;
      throw err;
    }
  }
}
