import fs from "node:fs";
import path from "node:path";
import type { AudioFormat } from "../../playback/PlaybackClient.js";

export type StoredClip = {
  file: string;
  format: AudioFormat;
  bytes: number;
};

export function formatOf(file: string): AudioFormat {
  return file.toLowerCase().endsWith(".wav") ? "wav" : "mp3";
}

/** `audio/wav`, `audio/x-wav`, `audio/wave` → wav; anything else is treated as mp3. */
export function formatForContentType(contentType: string | undefined): AudioFormat {
  return (contentType ?? "").toLowerCase().includes("wav") ? "wav" : "mp3";
}

/**
 * Flat directory of generated clips. Only bare file names are ever resolved,
 * so a request can't reach outside the directory.
 */
export class AudioStore {
  readonly root: string;
  private latestFile: string | null = null;

  constructor(dir: string) {
    this.root = path.resolve(dir);
    fs.mkdirSync(this.root, { recursive: true });
  }

  get latest(): string | null {
    return this.latestFile;
  }

  save(bytes: Uint8Array, format: AudioFormat, now: Date = new Date()): StoredClip {
    const file = `tts_${Math.floor(now.getTime() / 1000)}.${format}`;
    fs.writeFileSync(path.join(this.root, file), bytes);
    this.latestFile = file;
    return { file, format, bytes: bytes.length };
  }

  list(): string[] {
    return fs.readdirSync(this.root)
      .filter((f) => fs.statSync(path.join(this.root, f)).isFile())
      .sort();
  }

  /** Absolute path of a stored clip, or null for unknown or non-basename names. */
  resolve(file: string): string | null {
    if (!file || file !== path.basename(file) || file.startsWith(".")) return null;
    const p = path.join(this.root, file);
    return fs.existsSync(p) && fs.statSync(p).isFile() ? p : null;
  }
}
