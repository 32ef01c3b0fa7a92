import { spawn } from 'node:child_process';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import wavefile from 'wavefile';
const { WaveFile } = wavefile;

export interface DecodedAudio {
  /** Mono PCM in [-1, 1] at the file's own sample rate. */
  samples: Float32Array;
  sampleRateHz: number;
  durationSec: number;
}

export interface DecodeOptions {
  ffmpegPath?: string;
}

export class AudioDecodeError extends Error {
  readonly code = 'DECODE_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioDecodeError';
  }
}

const WavFormatSchema = z.object({
  numChannels: z.number().int().positive(),
  sampleRate: z.number().positive(),
});

export function isWav(bytes: Uint8Array): boolean {
  return bytes.length >= 12
    && Buffer.from(bytes.subarray(0, 4)).toString('latin1') === 'RIFF'
    && Buffer.from(bytes.subarray(8, 12)).toString('latin1') === 'WAVE';
}

/**
 * Decode an audio clip to mono float PCM. WAV is read directly; anything else
 * (TTS services hand back MP3) goes through ffmpeg first.
 */
export async function decodeAudio(bytes: Uint8Array, options: DecodeOptions = {}): Promise<DecodedAudio> {
  const wavBytes = isWav(bytes) ? bytes : await transcodeToWav(bytes, options.ffmpegPath ?? 'ffmpeg');
  return decodeWav(wavBytes);
}

export function decodeWav(bytes: Uint8Array): DecodedAudio {
  let channels: Float64Array[];
  let sampleRateHz: number;
  try {
    const wav = new WaveFile(bytes);
    const fmt = WavFormatSchema.parse(wav.fmt);
    sampleRateHz = fmt.sampleRate;
    wav.toBitDepth('32f');
    const raw: unknown = wav.getSamples(false, Float64Array);
    channels = raw instanceof Float64Array
      ? [raw]
      : Array.isArray(raw) ? raw.filter((c): c is Float64Array => c instanceof Float64Array) : [];
  } catch (err) {
    throw new AudioDecodeError(`Unreadable WAV: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  if (channels.length === 0) throw new AudioDecodeError('WAV has no sample data');

  // Downmix by averaging channels
  const length = channels[0].length;
  const samples = new Float32Array(length);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) samples[i] += channel[i] / channels.length;
  }

  return { samples, sampleRateHz, durationSec: length / sampleRateHz };
}

/**
 * Pipe the clip into ffmpeg and let it write a 16-bit mono WAV to a temp
 * file. A seekable output keeps the RIFF sizes in the header correct.
 */
async function transcodeToWav(bytes: Uint8Array, ffmpegPath: string): Promise<Uint8Array> {
  const dir = await mkdtemp(join(tmpdir(), 'facelink-'));
  const outPath = join(dir, 'clip.wav');
  try {
    await new Promise<void>((resolve, reject) => {
      const proc = spawn(ffmpegPath, [
        '-hide_banner', '-loglevel', 'error',
        '-i', 'pipe:0',
        '-ac', '1', '-acodec', 'pcm_s16le',
        '-y', outPath,
      ], { stdio: ['pipe', 'ignore', 'pipe'] });

      let stderr = '';
      proc.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString('utf-8'); });
      proc.on('error', (err) => reject(new AudioDecodeError(`Cannot run ${ffmpegPath}: ${err.message}`, { cause: err })));
      proc.on('close', (code) => {
        if (code === 0) resolve();
        else reject(new AudioDecodeError(`ffmpeg exited with ${code}: ${stderr.trim()}`));
      });
      // ffmpeg may stop reading early on a bad stream; the exit code reports that
      proc.stdin.on('error', () => undefined);
      proc.stdin.end(bytes);
    });
    return await readFile(outPath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
