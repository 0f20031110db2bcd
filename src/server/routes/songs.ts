import { Router, type RequestHandler } from 'express';
import fs from 'node:fs';
import { z } from 'zod';
import { createSong } from '../../compose/song.js';
import type { RandomSource } from '../../compose/random.js';
import { errorMessage } from '../../errors.js';
import type { GenerationService } from '../../generation/service.js';
import { renderMidi } from '../../midi/renderMidi.js';
import type { SongStore } from '../storage/songStore.js';

export const CreateSongBodySchema = z.object({
  prompt: z.string().trim().min(1, 'Missing prompt').max(2000),
  name: z.string().trim().max(120).optional(),
});

export interface SongsRouterDeps {
  service: GenerationService;
  store: SongStore;
  /** Applied to generation only. */
  limiter: RequestHandler;
  random?: RandomSource;
}

export function songsRouter({ service, store, limiter, random }: SongsRouterDeps) {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({ ok: true, songs: store.list() });
  });

  router.post('/', limiter, async (req, res) => {
    const body = CreateSongBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      res.status(400).json({ ok: false, error: body.error.issues.map(i => i.message).join('; ') });
      return;
    }

    try {
      const song = await createSong(body.data.prompt, { service, random });
      if (!song.ok) {
        res.status(502).json({ ok: false, code: song.error.code, error: song.error.message });
        return;
      }
      const meta = store.save(song.value, renderMidi(song.value.score), body.data.name);
      console.log(`[http] Saved song ${meta.id} (${meta.summary.partsAccepted}/${meta.summary.partsAttempted} parts)`);
      res.json({ ok: true, meta, outcomes: song.value.outcomes });
    } catch (err) {
      console.error(`[http] Song generation failed: ${errorMessage(err)}`);
      res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  router.get('/:id', (req, res) => {
    const meta = store.readMeta(req.params.id);
    if (!meta) {
      res.status(404).json({ ok: false, error: 'Song not found' });
      return;
    }
    res.json({ ok: true, meta });
  });

  router.get('/:id/song.mid', (req, res) => {
    const file = store.midiPath(req.params.id);
    if (!file) {
      res.status(404).end();
      return;
    }

    res.setHeader('Content-Type', 'audio/midi');
    res.setHeader('Content-Disposition', `attachment; filename="${req.params.id}.mid"`);
    fs.createReadStream(file).pipe(res);
  });

  router.delete('/:id', (req, res) => {
    if (!store.delete(req.params.id)) {
      res.status(404).json({ ok: false, error: 'Song not found' });
      return;
    }
    res.json({ ok: true });
  });

  return router;
}
