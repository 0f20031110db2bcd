import { Router } from 'express';
import type { SongStore } from '../storage/songStore.js';

export function healthRouter(store: SongStore) {
  const router = Router();
  const startedAt = Date.now();

  router.get('/', (req, res) => {
    res.json({
      ok: true,
      version: process.env.APP_VERSION ?? 'dev',
      node: process.version,
      songStorePath: store.root,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  return router;
}
