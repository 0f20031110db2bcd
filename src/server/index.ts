import { createServer } from 'node:http';
import { loadConfig } from '../config.js';
import { OpenAIGenerationService } from '../generation/service.js';
import { createApp } from './app.js';
import { SongStore } from './storage/songStore.js';

const config = loadConfig();
const store = new SongStore(config.songStoreDir);
const service = new OpenAIGenerationService(config.openai);

console.log(`[boot] OPENAI_MODEL   = ${config.openai.model}`);
console.log(`[boot] SONG_STORE_DIR = ${store.root}`);
console.log(`[boot] AUTH           = ${config.authToken ? 'bearer token' : 'open'}`);
console.log(`[boot] RATE_LIMIT_RPM = ${config.rateLimitRpm}`);

const app = createApp({ service, store, authToken: config.authToken, rateLimitRpm: config.rateLimitRpm });
const server = createServer(app);

server.listen(config.port, () => {
  console.log(`[boot] Song server running at http://localhost:${config.port}`);
});
