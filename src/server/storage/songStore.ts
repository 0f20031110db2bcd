import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { z } from 'zod';
import type { Song } from '../../compose/song.js';

export const SongMetaSchema = z.object({
  id: z.string(),
  name: z.string(),
  prompt: z.string(),
  createdAt: z.string(),
  midiHash: z.string(),
  midiBytes: z.number(),
  summary: z.object({
    tempo: z.number(),
    timeSignature: z.string(),
    key: z.string(),
    measures: z.number(),
    style: z.string(),
    partsAccepted: z.number(),
    partsAttempted: z.number(),
    paramsSource: z.enum(['service', 'default']),
    instrumentationSource: z.enum(['service', 'default']),
  }),
});

export type SongMeta = z.infer<typeof SongMetaSchema>;

const ID_PATTERN = /^[\w-]+$/;
const UNTITLED = /^Untitled-(\d+)$/;

function sha256Short(buf: Uint8Array | string) {
  return crypto.createHash('sha256').update(buf).digest('hex').slice(0, 8);
}

function writeJson(file: string, value: unknown) {
  fs.writeFileSync(file, JSON.stringify(value, null, 2));
}

/**
 * One directory per song under `root`: meta.json, params.json,
 * instrumentation.json, report.json and song.mid.
 */
export class SongStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private ensureRoot() {
    fs.mkdirSync(this.root, { recursive: true });
  }

  /** Null for ids that could escape the store root. */
  songDir(id: string): string | null {
    return ID_PATTERN.test(id) ? path.join(this.root, id) : null;
  }

  readMeta(id: string): SongMeta | null {
    const dir = this.songDir(id);
    if (!dir) return null;
    const metaPath = path.join(dir, 'meta.json');
    if (!fs.existsSync(metaPath)) return null;
    try {
      const parsed = SongMetaSchema.safeParse(JSON.parse(fs.readFileSync(metaPath, 'utf8')));
      return parsed.success ? parsed.data : null;
    } catch (e) {
      console.warn(`[store] Unreadable meta for ${id}: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }

  list(): SongMeta[] {
    this.ensureRoot();
    const metas: SongMeta[] = [];
    for (const entry of fs.readdirSync(this.root, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const meta = this.readMeta(entry.name);
      if (meta) metas.push(meta);
    }
    metas.sort((a, b) => (a.createdAt < b.createdAt ? 1 : -1));
    return metas;
  }

  private nextUntitledName(): string {
    let highest = 0;
    for (const meta of this.list()) {
      const match = UNTITLED.exec(meta.name);
      if (match) highest = Math.max(highest, Number(match[1]));
    }
    return `Untitled-${highest + 1}`;
  }

  save(song: Song, midi: Uint8Array, name?: string): SongMeta {
    this.ensureRoot();

    const createdAt = new Date().toISOString();
    const id = `${createdAt.replace(/[:.]/g, '-')}-${crypto.randomBytes(3).toString('hex')}`;
    const dir = path.join(this.root, id);
    fs.mkdirSync(dir, { recursive: true });

    const accepted = song.outcomes.filter(o => o.status === 'accepted').length;
    const meta: SongMeta = {
      id,
      name: name?.trim() || this.nextUntitledName(),
      prompt: song.prompt,
      createdAt,
      midiHash: sha256Short(midi),
      midiBytes: midi.length,
      summary: {
        tempo: song.params.tempo,
        timeSignature: song.params.timeSignature,
        key: song.params.key,
        measures: song.params.measures,
        style: song.params.style,
        partsAccepted: accepted,
        partsAttempted: song.outcomes.length,
        paramsSource: song.paramsSource,
        instrumentationSource: song.instrumentationSource,
      },
    };

    writeJson(path.join(dir, 'meta.json'), meta);
    writeJson(path.join(dir, 'params.json'), song.params);
    writeJson(path.join(dir, 'instrumentation.json'), song.instrumentation);
    writeJson(path.join(dir, 'report.json'), song.outcomes);
    fs.writeFileSync(path.join(dir, 'song.mid'), midi);

    return meta;
  }

  midiPath(id: string): string | null {
    const dir = this.songDir(id);
    if (!dir) return null;
    const file = path.join(dir, 'song.mid');
    return fs.existsSync(file) ? file : null;
  }

  delete(id: string): boolean {
    const dir = this.songDir(id);
    if (!dir || !fs.existsSync(dir)) return false;
    fs.rmSync(dir, { recursive: true, force: true });
    return true;
  }
}
