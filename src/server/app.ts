import express from 'express';
import cors from 'cors';
import type { PlaybackTrigger } from '../playback/PlaybackClient.js';
import type { AudioStore } from './storage/audioStore.js';
import { healthRouter } from './routes/health.js';
import { audioRouter } from './routes/audio.js';
import { requireAuth } from './middleware/auth.js';
import { rateLimit } from './middleware/rateLimit.js';

export type AppDeps = {
  store: AudioStore;
  player?: PlaybackTrigger;
  publicBaseUrl: string;
  playerLabel?: string;
  authToken?: string;
  rateLimitRpm?: number;
};

export function createApp(deps: AppDeps) {
  const app = express();
  const playerLabel = deps.playerLabel ?? (deps.player ? "configured" : "not configured");

  app.use(cors());

  app.use('/api/health', healthRouter(deps.store, playerLabel));
  // Clip downloads stay open for the player; playback triggers are gated when AUTH_TOKEN is set
  app.use(audioRouter({
    store: deps.store,
    player: deps.player,
    publicBaseUrl: deps.publicBaseUrl,
    playerLabel,
    guard: [requireAuth(deps.authToken), rateLimit(deps.rateLimitRpm ?? 20)],
  }));

  return app;
}
