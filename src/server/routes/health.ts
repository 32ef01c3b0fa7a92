import { Router } from 'express';
import type { AudioStore } from '../storage/audioStore.js';

const startedAt = Date.now();

export function healthRouter(store: AudioStore, playerLabel: string): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({
      ok: true,
      version: process.env.APP_VERSION ?? "dev",
      node: process.version,
      audioDir: store.root,
      clips: store.list().length,
      player: playerLabel,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
