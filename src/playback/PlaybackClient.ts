/**
 * HTTP client for the networked audio player that speaks the clips.
 *
 * The player fetches the clip itself from the URL it is given, so playback
 * start is only known to have been requested, never confirmed.
 */

import { z } from 'zod';

export type AudioFormat = 'mp3' | 'wav';

/** The one call the mouth sync needs; lets tests and dry runs stand in for the player. */
export interface PlaybackTrigger {
  play(url: string, format: AudioFormat): Promise<Record<string, unknown>>;
}

export class PlaybackError extends Error {
  readonly code = 'PLAYBACK_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlaybackError';
  }
}

const PlayerReplySchema = z.record(z.string(), z.unknown());

export const DEFAULT_PLAYER_PORT = 8082;

export class PlaybackClient implements PlaybackTrigger {
  readonly baseUrl: string;

  constructor(baseUrl: string, private readonly timeoutMs: number = 5000) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /** `192.168.1.50` or `192.168.1.50:8082` → client for that player. */
  static forHost(host: string, port: number = DEFAULT_PLAYER_PORT): PlaybackClient {
    const withPort = /:\d+$/.test(host) ? host : `${host}:${port}`;
    return new PlaybackClient(`http://${withPort}`);
  }

  play(url: string, format: AudioFormat): Promise<Record<string, unknown>> {
    return this.post('/play', { url, format });
  }

  stop(): Promise<Record<string, unknown>> {
    return this.post('/stop');
  }

  volume(level: number): Promise<Record<string, unknown>> {
    return this.post('/volume', { level });
  }

  private async post(path: string, body?: object): Promise<Record<string, unknown>> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: body ? { 'Content-Type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new PlaybackError(`Player unreachable at ${this.baseUrl}${path}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    const text = await res.text();
    if (!res.ok) {
      throw new PlaybackError(`Player answered ${res.status} on ${path}: ${text}`);
    }
    if (text.trim() === '') return {};
    try {
      return PlayerReplySchema.parse(JSON.parse(text));
    } catch (err) {
      throw new PlaybackError(`Player sent an unreadable reply on ${path}: ${text}`, { cause: err });
    }
  }
}
