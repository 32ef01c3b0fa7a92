import { setTimeout as sleep } from 'node:timers/promises';
import type { DeviceResponse } from '../types/protocol.js';
import type { LinkSession } from '../link/LinkSession.js';

export const DISPLAY_WIDTH = 480;
export const DISPLAY_HEIGHT = 480;

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Typed front end for the display's command set. Every method is one
 * request/response exchange on the session; the session itself treats the
 * commands as opaque.
 */
export class FaceDisplay {
  constructor(readonly link: LinkSession) {}

  // ── Screen ───────────────────────────────────────────────────

  /** Show a JPEG, ideally already 480×480. Turns face mode off on the device. */
  showJpeg(jpeg: Uint8Array): Promise<DeviceResponse> {
    return this.link.sendBinaryPayload(jpeg);
  }

  clear(color = '#000000'): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'clear', color });
  }

  backlight(on = true): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'bl', on });
  }

  // ── Face mode ────────────────────────────────────────────────

  faceOn(): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'face', on: true });
  }

  faceOff(): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'face', on: false });
  }

  /** Acknowledged mouth update. Lip sync uses the fire-and-forget path instead. */
  setMouth(openness: number): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'mouth', open: clamp01(openness) });
  }

  /** 0 = no hearts, 1 = all six floating hearts. */
  setLove(value: number): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'love', value: clamp01(value) });
  }

  blink(): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'blink' });
  }

  // ── Buzzer ───────────────────────────────────────────────────

  tone(freqHz: number, durationMs = 200): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'tone', freq: freqHz, dur: durationMs });
  }

  /** `notes` is "C4:4 D4:4 E4:4 ..." (note:duration pairs). */
  melody(notes: string): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'melody', notes });
  }

  stopAudio(): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'stop' });
  }

  beep(): Promise<DeviceResponse> {
    return this.tone(1000, 100);
  }

  async alert(): Promise<DeviceResponse[]> {
    const responses: DeviceResponse[] = [];
    for (let i = 0; i < 3; i++) {
      if (i > 0) await sleep(150);
      responses.push(await this.tone(2000, 100));
    }
    return responses;
  }

  // ── Network ──────────────────────────────────────────────────

  wifiStatus(): Promise<DeviceResponse> {
    return this.link.sendCommand({ cmd: 'wifi' });
  }
}
