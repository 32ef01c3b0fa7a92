import { loadConfig, envelopeOptions } from '../config.js';
import { playWithMouthSync } from '../audio/mouthSync.js';
import { PlaybackClient } from '../playback/PlaybackClient.js';
import { connectDisplay } from './connect.js';

async function main() {
  const args = process.argv.slice(2);
  if (args.length < 1) {
    console.error('Usage: npx tsx src/cli/mouth-sync.ts <audio-url> [port-or-host]');
    console.error('  Plays the clip on PLAYER_HOST (if set) and animates the face mouth to it.');
    process.exit(1);
  }

  const [audioUrl, host] = args;
  const config = loadConfig();
  const link = await connectDisplay(host, config);
  const playback = config.PLAYER_HOST ? PlaybackClient.forHost(config.PLAYER_HOST, config.PLAYER_PORT) : undefined;
  if (!playback) console.log('PLAYER_HOST not set; animating without audio playback.');

  try {
    await link.sendCommand({ cmd: 'face', on: true });
    const handle = await playWithMouthSync(link, {
      audioUrl,
      playback,
      bufferDelayMs: config.MOUTH_BUFFER_DELAY_MS,
      envelope: envelopeOptions(config),
      ffmpegPath: config.FFMPEG_PATH,
    });
    if (!handle) {
      process.exitCode = 1;
      return;
    }
    process.once('SIGINT', () => handle.cancel());
    const report = await handle.done;
    console.log(`Sent ${report.framesSent}/${handle.envelope.frames.length} frames${report.cancelled ? ' (cancelled)' : ''}`);
  } finally {
    await link.close();
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
