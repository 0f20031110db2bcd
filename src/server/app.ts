import express from 'express';
import cors from 'cors';
import type { RandomSource } from '../compose/random.js';
import type { GenerationService } from '../generation/service.js';
import { healthRouter } from './routes/health.js';
import { songsRouter } from './routes/songs.js';
import { requireAuth } from './middleware/auth.js';
import { rateLimit } from './middleware/rateLimit.js';
import type { SongStore } from './storage/songStore.js';

export interface AppDeps {
  service: GenerationService;
  store: SongStore;
  authToken?: string;
  rateLimitRpm: number;
  random?: RandomSource;
}

export function createApp({ service, store, authToken, rateLimitRpm, random }: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  // Songs are auth-gated when AUTH_TOKEN is set
  app.use('/api/health', healthRouter(store));
  app.use(
    '/api/songs',
    requireAuth(authToken),
    songsRouter({ service, store, random, limiter: rateLimit({ maxPerWindow: rateLimitRpm }) }),
  );

  return app;
}
