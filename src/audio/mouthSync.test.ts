import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import wavefile from 'wavefile';
import { playWithMouthSync } from './mouthSync.js';
import type { CommandNotifier } from '../link/LinkSession.js';
import type { AudioFormat, PlaybackTrigger } from '../playback/PlaybackClient.js';
import type { DeviceCommand } from '../types/protocol.js';
const { WaveFile } = wavefile;

const SR = 16000;

function toneWav(seconds: number): Uint8Array {
  const samples = new Float32Array(Math.round(seconds * SR));
  for (let i = 0; i < samples.length; i++) samples[i] = 0.5 * Math.sin((2 * Math.PI * 500 * i) / SR);
  const wav = new WaveFile();
  wav.fromScratch(1, SR, '32f', samples);
  return wav.toBuffer();
}

class Recorder implements CommandNotifier {
  readonly commands: DeviceCommand[] = [];
  async notify(command: DeviceCommand): Promise<void> {
    this.commands.push(command);
  }
}

class FakePlayer implements PlaybackTrigger {
  readonly calls: { url: string; format: AudioFormat }[] = [];
  constructor(private readonly fail = false) {}
  async play(url: string, format: AudioFormat): Promise<Record<string, unknown>> {
    this.calls.push({ url, format });
    if (this.fail) throw new Error('player offline');
    return { status: 'playing' };
  }
}

describe('playWithMouthSync', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts the player, then animates the whole envelope and closes the mouth', async () => {
    const notifier = new Recorder();
    const player = new FakePlayer();

    const handle = await playWithMouthSync(notifier, {
      audioUrl: 'http://pi.local:8080/audio/tts_1.wav',
      playback: player,
      bufferDelayMs: 0,
      envelope: { frameMs: 10 },
      fetchAudio: async () => toneWav(0.3),
    });

    expect(handle).not.toBeNull();
    expect(player.calls).toEqual([{ url: 'http://pi.local:8080/audio/tts_1.wav', format: 'wav' }]);

    const report = await handle?.done;
    // 30 frames of 10 ms, truncated to floor(0.3 * 0.7 * 1000 / 10) = 21
    expect(handle?.envelope.frames).toHaveLength(21);
    expect(report).toMatchObject({ framesSent: 21, cancelled: false });
    expect(notifier.commands).toHaveLength(22);
    expect(notifier.commands[21]).toEqual({ cmd: 'mouth', open: 0 });
    expect(notifier.commands.every(c => c.cmd === 'mouth')).toBe(true);
  });

  it('animates even when the play request fails', async () => {
    const notifier = new Recorder();

    const handle = await playWithMouthSync(notifier, {
      audioUrl: 'http://pi.local:8080/audio/tts_2.mp3',
      format: 'wav',
      playback: new FakePlayer(true),
      bufferDelayMs: 0,
      envelope: { frameMs: 10 },
      fetchAudio: async () => toneWav(0.2),
    });

    expect(await handle?.done).toMatchObject({ cancelled: false });
    expect(notifier.commands.length).toBeGreaterThan(1);
  });

  it('stops early and closes the mouth when cancelled', async () => {
    const notifier = new Recorder();

    const handle = await playWithMouthSync(notifier, {
      audioUrl: 'http://pi.local:8080/audio/tts_3.wav',
      bufferDelayMs: 0,
      envelope: { frameMs: 20 },
      fetchAudio: async () => toneWav(2),
    });
    await new Promise(resolve => setTimeout(resolve, 50));
    handle?.cancel();

    const report = await handle?.done;
    expect(report?.cancelled).toBe(true);
    expect(report?.framesSent).toBeLessThan(handle?.envelope.frames.length ?? 0);
    expect(notifier.commands[notifier.commands.length - 1]).toEqual({ cmd: 'mouth', open: 0 });
  });

  it('gives up without touching the face when the download fails or is too short', async () => {
    const notifier = new Recorder();
    const player = new FakePlayer();

    const failed = await playWithMouthSync(notifier, {
      audioUrl: 'http://pi.local:8080/audio/missing.mp3',
      playback: player,
      fetchAudio: async () => {
        throw new Error('404');
      },
    });
    const tiny = await playWithMouthSync(notifier, {
      audioUrl: 'http://pi.local:8080/audio/tiny.mp3',
      playback: player,
      fetchAudio: async () => new Uint8Array(40),
    });

    expect(failed).toBeNull();
    expect(tiny).toBeNull();
    expect(player.calls).toEqual([]);
    expect(notifier.commands).toEqual([]);
  });
});
