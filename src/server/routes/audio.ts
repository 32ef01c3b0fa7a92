import express, { Router, type Response } from "express";
import fs from "node:fs";
import type { PlaybackTrigger } from "../../playback/PlaybackClient.js";
import { type AudioStore, formatForContentType, formatOf, type StoredClip } from "../storage/audioStore.js";

/** Error code on every 404 body for a missing clip. */
export const AUDIO_NOT_FOUND = "AUDIO_NOT_FOUND";

export type AudioRouteDeps = {
  store: AudioStore;
  /** Absent when no player is configured; play requests then report that. */
  player?: PlaybackTrigger;
  /** `http://<lan-ip>:<port>`, the address the player fetches clips from. */
  publicBaseUrl: string;
  playerLabel: string;
  /** Extra handlers (auth, rate limit) in front of the routes that trigger playback. */
  guard?: express.RequestHandler[];
  uploadLimit?: string;
};

function sendClip(res: Response, filePath: string, file: string) {
  res.setHeader("Content-Type", formatOf(file) === "wav" ? "audio/wav" : "audio/mpeg");
  fs.createReadStream(filePath).pipe(res);
}

export function audioRouter(deps: AudioRouteDeps): Router {
  const { store, player, publicBaseUrl, playerLabel } = deps;
  const guard = deps.guard ?? [];
  const router = Router();

  const tellPlayer = async (url: string, file: string): Promise<Record<string, unknown>> => {
    if (!player) return { error: "player not configured" };
    try {
      return await player.play(url, formatOf(file));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[audio-server] Play request failed: ${message}`);
      return { error: message };
    }
  };

  router.get("/status", (req, res) => {
    res.json({ latest: store.latest, files: store.list(), player: playerLabel });
  });

  // Registered before /audio/:filename so "latest" is not taken as a file name
  router.get("/audio/latest", (req, res) => {
    const latest = store.latest;
    const p = latest ? store.resolve(latest) : null;
    if (!latest || !p) return res.status(404).json({ ok: false, error: "no audio available", code: AUDIO_NOT_FOUND });
    sendClip(res, p, latest);
  });

  router.get("/audio/:filename", (req, res) => {
    const p = store.resolve(req.params.filename);
    if (!p) return res.status(404).json({ ok: false, error: "not found", code: AUDIO_NOT_FOUND });
    sendClip(res, p, req.params.filename);
  });

  router.post(
    "/upload_and_play",
    ...guard,
    express.raw({ type: "audio/*", limit: deps.uploadLimit ?? "20mb" }),
    async (req, res) => {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        return res.status(400).json({ ok: false, error: "expected a non-empty audio/* body" });
      }

      let clip: StoredClip;
      try {
        clip = store.save(body, formatForContentType(req.headers["content-type"]));
      } catch (err) {
        return res.status(500).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
      }
      console.log(`[audio-server] Saved ${clip.file} (${clip.bytes} bytes)`);

      const url = `${publicBaseUrl}/audio/${clip.file}`;
      const playerResponse = await tellPlayer(url, clip.file);
      res.json({ file: clip.file, url, player_response: playerResponse });
    },
  );

  router.post("/play_latest", ...guard, async (req, res) => {
    const latest = store.latest;
    if (!latest) return res.status(404).json({ ok: false, error: "no audio available", code: AUDIO_NOT_FOUND });

    const url = `${publicBaseUrl}/audio/${latest}`;
    const playerResponse = await tellPlayer(url, latest);
    res.json({ audio_url: url, player_response: playerResponse });
  });

  return router;
}
