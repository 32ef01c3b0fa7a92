import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig, envelopeOptions } from '../config.js';
import { extractEnvelope } from '../audio/envelope.js';

// Usage: npx tsx src/cli/analyze-envelope.ts <clip.wav|clip.mp3> [--json]
// Prints the mouth envelope for a clip without touching any device.

const BAR_WIDTH = 40;

async function main() {
  const args = process.argv.slice(2);
  const asJson = args.includes('--json');
  const clipPath = args.find(a => !a.startsWith('--'));
  if (!clipPath) {
    console.error('Usage: npx tsx src/cli/analyze-envelope.ts <clip.wav|clip.mp3> [--json]');
    process.exit(1);
  }

  const config = loadConfig();
  const bytes = await readFile(resolve(clipPath));
  const envelope = await extractEnvelope(bytes, envelopeOptions(config), { ffmpegPath: config.FFMPEG_PATH });

  if (asJson) {
    console.log(JSON.stringify(envelope));
    return;
  }

  const animSec = envelope.frames.length * envelope.frameMs / 1000;
  console.log(`Audio: ${envelope.audioDurationSec.toFixed(2)}s @ ${envelope.sampleRateHz} Hz`);
  console.log(`Envelope: ${envelope.frames.length} frames x ${envelope.frameMs}ms = ${animSec.toFixed(2)}s`);
  envelope.frames.forEach((v, i) => {
    const t = (i * envelope.frameMs / 1000).toFixed(2).padStart(6);
    console.log(`${t}s ${v.toFixed(2)} ${'#'.repeat(Math.round(v * BAR_WIDTH))}`);
  });
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
