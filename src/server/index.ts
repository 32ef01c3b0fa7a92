import { networkInterfaces } from 'node:os';
import { loadConfig } from '../config.js';
import { PlaybackClient } from '../playback/PlaybackClient.js';
import { createApp } from './app.js';
import { AudioStore } from './storage/audioStore.js';

/** First non-internal IPv4 address, which is what the player on the LAN can reach. */
function lanAddress(): string {
  for (const addrs of Object.values(networkInterfaces())) {
    for (const addr of addrs ?? []) {
      if (addr.family === 'IPv4' && !addr.internal) return addr.address;
    }
  }
  return '127.0.0.1';
}

const config = loadConfig();
const store = new AudioStore(config.AUDIO_DIR);
const player = config.PLAYER_HOST ? PlaybackClient.forHost(config.PLAYER_HOST, config.PLAYER_PORT) : undefined;
const publicHost = config.PUBLIC_HOST ?? lanAddress();

const app = createApp({
  store,
  player,
  publicBaseUrl: `http://${publicHost}:${config.PORT}`,
  playerLabel: player ? player.baseUrl : 'not configured',
  authToken: config.AUTH_TOKEN,
  rateLimitRpm: config.RATE_LIMIT_RPM,
});

app.listen(config.PORT, () => {
  console.log(`[audio-server] Listening on http://0.0.0.0:${config.PORT}`);
  console.log(`[audio-server] Audio directory: ${store.root}`);
  console.log(player
    ? `[audio-server] Player target: ${player.baseUrl}`
    : '[audio-server] Player not set (use PLAYER_HOST)');
});
