import { z } from 'zod';
import { DEFAULT_ENVELOPE_OPTIONS, type EnvelopeOptions } from './audio/envelope.js';

const optionalString = z.string().trim().min(1).optional().catch(undefined);
const port = z.coerce.number().int().min(1).max(65_535);

export const ConfigSchema = z.object({
  // ── Display link ─────────────────────────────────────────────
  /** Serial path, `COMx`, or `host[:port]`. Unset = auto-detect a serial port. */
  SENSECAP_HOST: optionalString,
  LINK_PORT: port.default(7777),
  BAUD: z.coerce.number().int().positive().default(921_600),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  IMAGE_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  IMAGE_DECODE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // ── Servo board ──────────────────────────────────────────────
  SERVO_PORT: optionalString,
  SERVO_BAUD: z.coerce.number().int().positive().default(115_200),

  // ── Audio player + file server ───────────────────────────────
  PLAYER_HOST: optionalString,
  PLAYER_PORT: port.default(8082),
  AUDIO_DIR: z.string().default('audio_files'),
  PORT: port.default(8080),
  /** Address the player uses to reach this server. Unset = first LAN IPv4. */
  PUBLIC_HOST: optionalString,
  AUTH_TOKEN: optionalString,
  RATE_LIMIT_RPM: z.coerce.number().int().positive().default(20),
  FFMPEG_PATH: z.string().default('ffmpeg'),

  // ── Mouth animation ──────────────────────────────────────────
  MOUTH_FRAME_MS: z.coerce.number().positive().default(DEFAULT_ENVELOPE_OPTIONS.frameMs),
  MOUTH_SMOOTH_ALPHA: z.coerce.number().min(0).max(1).default(DEFAULT_ENVELOPE_OPTIONS.smoothAlpha),
  MOUTH_POWER_CURVE: z.coerce.number().positive().default(DEFAULT_ENVELOPE_OPTIONS.powerCurve),
  MOUTH_SILENCE_THRESHOLD: z.coerce.number().min(0).default(DEFAULT_ENVELOPE_OPTIONS.silenceThreshold),
  MOUTH_TRIM_FLOOR: z.coerce.number().min(0).default(DEFAULT_ENVELOPE_OPTIONS.trimFloor),
  MOUTH_TAIL_FRAMES: z.coerce.number().int().min(0).default(DEFAULT_ENVELOPE_OPTIONS.tailFrames),
  MOUTH_DURATION_SCALE: z.coerce.number().positive().default(DEFAULT_ENVELOPE_OPTIONS.durationScale),
  MOUTH_BUFFER_DELAY_MS: z.coerce.number().int().min(0).default(400),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Parse the environment once; throws with every bad variable listed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export function envelopeOptions(config: Config): EnvelopeOptions {
  return {
    ...DEFAULT_ENVELOPE_OPTIONS,
    frameMs: config.MOUTH_FRAME_MS,
    smoothAlpha: config.MOUTH_SMOOTH_ALPHA,
    powerCurve: config.MOUTH_POWER_CURVE,
    silenceThreshold: config.MOUTH_SILENCE_THRESHOLD,
    trimFloor: config.MOUTH_TRIM_FLOOR,
    tailFrames: config.MOUTH_TAIL_FRAMES,
    durationScale: config.MOUTH_DURATION_SCALE,
  };
}

export function linkTimeouts(config: Config) {
  return {
    commandTimeoutMs: config.COMMAND_TIMEOUT_MS,
    imageReadyTimeoutMs: config.IMAGE_READY_TIMEOUT_MS,
    imageDecodeTimeoutMs: config.IMAGE_DECODE_TIMEOUT_MS,
  };
}
