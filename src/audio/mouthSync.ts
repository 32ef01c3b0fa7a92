/**
 * Play a spoken clip on the networked player and move the face's mouth to it.
 *
 *   1. download the clip
 *   2. extract its loudness envelope
 *   3. ask the player to start (no confirmation comes back)
 *   4. wait a fixed buffering delay for the player's own fetch/decode
 *   5. run the mouth animation in the background
 *
 * Synchronization is best-effort: steps 3–4 are open loop.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { CommandNotifier } from '../link/LinkSession.js';
import type { AudioFormat, PlaybackTrigger } from '../playback/PlaybackClient.js';
import { extractEnvelope, type Envelope, type EnvelopeOptions } from './envelope.js';
import { animateMouth, type AnimationReport } from './MouthAnimator.js';

export const MIN_AUDIO_BYTES = 100;

export interface MouthSyncOptions {
  audioUrl: string;
  playback?: PlaybackTrigger;
  format?: AudioFormat;
  bufferDelayMs?: number;
  downloadTimeoutMs?: number;
  envelope?: Partial<EnvelopeOptions>;
  ffmpegPath?: string;
  /** Replaces the HTTP download. */
  fetchAudio?: (url: string) => Promise<Uint8Array>;
}

export interface MouthSyncHandle {
  envelope: Envelope;
  done: Promise<AnimationReport>;
  cancel(): void;
}

export async function downloadAudio(url: string, timeoutMs: number = 10_000): Promise<Uint8Array> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) throw new Error(`GET ${url} answered ${res.status}`);
  return new Uint8Array(await res.arrayBuffer());
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Returns the running animation, or null when there is nothing to animate
 * (download failed, clip too short, decode failed, no frames). A failed
 * play request is logged and the mouth still moves.
 */
export async function playWithMouthSync(
  notifier: CommandNotifier,
  options: MouthSyncOptions,
): Promise<MouthSyncHandle | null> {
  const { audioUrl, playback } = options;
  const format = options.format ?? (audioUrl.toLowerCase().endsWith('.wav') ? 'wav' : 'mp3');
  const bufferDelayMs = options.bufferDelayMs ?? 400;
  const fetchAudio = options.fetchAudio ?? ((url: string) => downloadAudio(url, options.downloadTimeoutMs));

  let audio: Uint8Array;
  try {
    audio = await fetchAudio(audioUrl);
  } catch (err) {
    console.warn(`[mouth] Failed to download audio: ${errorText(err)}`);
    return null;
  }
  if (audio.length < MIN_AUDIO_BYTES) {
    console.warn(`[mouth] Audio too small (${audio.length} bytes), skipping animation`);
    return null;
  }

  let envelope: Envelope;
  try {
    envelope = await extractEnvelope(audio, options.envelope, { ffmpegPath: options.ffmpegPath });
  } catch (err) {
    console.warn(`[mouth] Audio analysis failed: ${errorText(err)}`);
    return null;
  }
  if (envelope.frames.length === 0) {
    console.warn('[mouth] No amplitude data extracted');
    return null;
  }

  const animSec = envelope.frames.length * envelope.frameMs / 1000;
  const ratio = envelope.audioDurationSec > 0 ? animSec / envelope.audioDurationSec : 1;
  console.log(`[mouth] Audio ${envelope.audioDurationSec.toFixed(2)}s, animation ${animSec.toFixed(2)}s (${ratio.toFixed(2)}x), ${envelope.frames.length} frames`);

  if (playback) {
    try {
      const reply = await playback.play(audioUrl, format);
      console.log(`[mouth] Player: ${JSON.stringify(reply)}`);
    } catch (err) {
      console.warn(`[mouth] Play request failed: ${errorText(err)}`);
    }
  } else {
    console.warn('[mouth] No player configured; animating without audio');
  }

  if (bufferDelayMs > 0) await sleep(bufferDelayMs);

  const controller = new AbortController();
  const done = animateMouth(notifier, envelope.frames, {
    frameMs: envelope.frameMs,
    signal: controller.signal,
  });

  return {
    envelope,
    done,
    cancel: () => controller.abort(),
  };
}
