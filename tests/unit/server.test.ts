import { mkdtempSync, rmSync } from 'node:fs';
import type { Server } from 'node:http';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { seededRandom } from '../../src/compose/random.js';
import { createApp, type AppDeps } from '../../src/server/app.js';
import { SongMetaSchema, SongStore } from '../../src/server/storage/songStore.js';
import { ScriptedService } from '../fakes.js';

const SONG_REPLIES = [
  '{"tempo": 100, "key": "Am", "measures": 64}',
  '{"rhythm": [["DrumSet", 10]], "harmony": [["Piano", 2]], "lead": [["Violin", 3]]}',
  '|C D C D|',
  '|A, C E A|',
  'Sorry, no melody today.',
];

const CreatedSchema = z.object({ ok: z.literal(true), meta: SongMetaSchema });
const ListSchema = z.object({ ok: z.literal(true), songs: z.array(SongMetaSchema) });

let root: string;
let server: Server | undefined;

async function start(overrides: Partial<AppDeps> = {}): Promise<string> {
  const app = createApp({
    service: new ScriptedService(SONG_REPLIES),
    store: new SongStore(root),
    rateLimitRpm: 10,
    random: seededRandom(5),
    ...overrides,
  });
  const listening = app.listen(0);
  server = listening;
  await new Promise<void>(resolve => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('Server is not bound to a port');
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(url, { method: 'POST', headers: { 'content-type': 'application/json', ...headers }, body: JSON.stringify(body) });
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'prompt-score-http-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) await new Promise<void>(resolve => running.close(() => resolve()));
  rmSync(root, { recursive: true, force: true });
});

describe('song routes', () => {
  it('reports health', async () => {
    const base = await start();
    const res = await fetch(`${base}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, songStorePath: root });
  });

  it('generates, serves and deletes a song', async () => {
    const base = await start();

    const created = await post(`${base}/api/songs`, { prompt: 'rainy city', name: 'Rain' });
    expect(created.status).toBe(200);
    const { meta } = CreatedSchema.parse(await created.json());
    expect(meta.name).toBe('Rain');
    expect(meta.summary).toMatchObject({ tempo: 100, key: 'Am', partsAccepted: 2, partsAttempted: 3 });
    const id = meta.id;

    const list = ListSchema.parse(await (await fetch(`${base}/api/songs`)).json());
    expect(list.songs.map(s => s.id)).toEqual([id]);

    const stored = await fetch(`${base}/api/songs/${id}`);
    expect(await stored.json()).toMatchObject({ ok: true, meta: { prompt: 'rainy city' } });

    const midi = await fetch(`${base}/api/songs/${id}/song.mid`);
    expect(midi.status).toBe(200);
    expect(midi.headers.get('content-type')).toBe('audio/midi');
    const bytes = new Uint8Array(await midi.arrayBuffer());
    expect([...bytes.slice(0, 4)]).toEqual([0x4d, 0x54, 0x68, 0x64]);

    expect((await fetch(`${base}/api/songs/${id}`, { method: 'DELETE' })).status).toBe(200);
    expect((await fetch(`${base}/api/songs/${id}`)).status).toBe(404);
    expect((await fetch(`${base}/api/songs/${id}/song.mid`)).status).toBe(404);
  });

  it('rejects a missing prompt', async () => {
    const base = await start();
    const res = await post(`${base}/api/songs`, { prompt: '   ' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Missing prompt' });
  });

  it('answers 502 when no part could be built', async () => {
    const base = await start({ service: new ScriptedService(['{}', '{}']) });
    const res = await post(`${base}/api/songs`, { prompt: 'silence' });
    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ ok: false, code: 'NO_VALID_PARTS' });
  });

  it('requires the bearer token when one is configured', async () => {
    const base = await start({ authToken: 'test-secret' });
    expect((await fetch(`${base}/api/health`)).status).toBe(200);
    expect((await fetch(`${base}/api/songs`)).status).toBe(401);
    expect((await fetch(`${base}/api/songs`, { headers: { authorization: 'Bearer test-secret' } })).status).toBe(200);
    expect((await fetch(`${base}/api/songs?token=test-secret`)).status).toBe(200);
  });

  it('rate-limits generation per client', async () => {
    const base = await start({ rateLimitRpm: 1 });
    expect((await post(`${base}/api/songs`, {})).status).toBe(400);
    expect((await post(`${base}/api/songs`, {})).status).toBe(429);
    expect((await fetch(`${base}/api/songs`)).status).toBe(200);
  });
});
