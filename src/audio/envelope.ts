/**
 * Loudness envelope for mouth animation.
 *
 * One value in [0, 1] per fixed frame of audio. The frame length matches the
 * face's redraw cadence, so the scheduler can send one mouth command per
 * frame.
 */

import { decodeAudio, type DecodeOptions } from './decode.js';

export interface EnvelopeOptions {
  /** Frame length in ms; also the animation send period. */
  frameMs: number;
  /** EMA weight of the previous value: 0 = no smoothing, 1 = frozen. */
  smoothAlpha: number;
  /** Exponent applied after normalization; < 1 exaggerates soft speech. */
  powerCurve: number;
  /** Normalized values at or below this become exactly 0. */
  silenceThreshold: number;
  /** Trailing frames below this count as silence when trimming. */
  trimFloor: number;
  /** Frames kept after the last audible one so the mouth closes naturally. */
  tailFrames: number;
  /**
   * Animation length as a fraction of the clip length. The face renders
   * slower than the player plays, so the motion is front-loaded to finish
   * near the end of the audio. Tuned by ear on one display; not derived.
   */
  durationScale: number;
  minOpen: number;
  maxOpen: number;
}

export const DEFAULT_ENVELOPE_OPTIONS: EnvelopeOptions = {
  frameMs: 30,
  smoothAlpha: 0.35,
  powerCurve: 0.6,
  silenceThreshold: 0.02,
  trimFloor: 0.01,
  tailFrames: 3,
  durationScale: 0.7,
  minOpen: 0,
  maxOpen: 1,
};

export interface Envelope {
  frames: number[];
  frameMs: number;
  /** Length of the decoded clip, before trimming and rescaling. */
  audioDurationSec: number;
  sampleRateHz: number;
}

export function computeEnvelope(
  samples: Float32Array,
  sampleRateHz: number,
  options: Partial<EnvelopeOptions> = {},
): Envelope {
  const opts = { ...DEFAULT_ENVELOPE_OPTIONS, ...options };
  const audioDurationSec = sampleRateHz > 0 ? samples.length / sampleRateHz : 0;
  const envelope: Envelope = { frames: [], frameMs: opts.frameMs, audioDurationSec, sampleRateHz };

  const frameSamples = Math.floor(sampleRateHz * opts.frameMs / 1000);
  if (frameSamples === 0 || samples.length === 0) return envelope;

  // RMS per whole window; a partial last window is dropped
  const numFrames = Math.floor(samples.length / frameSamples);
  if (numFrames === 0) return envelope;
  const rms = new Array<number>(numFrames);
  for (let f = 0; f < numFrames; f++) {
    let sum = 0;
    const start = f * frameSamples;
    for (let i = start; i < start + frameSamples; i++) sum += samples[i] * samples[i];
    rms[f] = Math.sqrt(sum / frameSamples);
  }

  const peak = rms.reduce((max, v) => (v > max ? v : max), 0);
  const normalized = peak > 0 ? rms.map(v => v / peak) : rms;

  const shaped = normalized
    .map(v => Math.pow(v, opts.powerCurve))
    .map(v => (v > opts.silenceThreshold ? v : 0));

  const smoothed: number[] = [];
  let prev = 0;
  for (const raw of shaped) {
    prev = opts.smoothAlpha * prev + (1 - opts.smoothAlpha) * raw;
    smoothed.push(Math.max(opts.minOpen, Math.min(opts.maxOpen, prev)));
  }

  let lastSound = smoothed.length - 1;
  while (lastSound > 0 && smoothed[lastSound] < opts.trimFloor) lastSound--;
  lastSound = Math.min(smoothed.length - 1, lastSound + opts.tailFrames);
  let frames = smoothed.slice(0, lastSound + 1);

  const targetFrames = Math.floor(audioDurationSec * opts.durationScale * 1000 / opts.frameMs);
  if (targetFrames > 0 && frames.length > targetFrames) {
    frames = frames.slice(0, targetFrames);
  }

  envelope.frames = frames;
  return envelope;
}

export async function extractEnvelope(
  audioBytes: Uint8Array,
  options: Partial<EnvelopeOptions> = {},
  decodeOptions: DecodeOptions = {},
): Promise<Envelope> {
  const { samples, sampleRateHz } = await decodeAudio(audioBytes, decodeOptions);
  return computeEnvelope(samples, sampleRateHz, options);
}
