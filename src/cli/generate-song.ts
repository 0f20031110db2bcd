import { createInterface } from 'node:readline/promises';
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { createSong } from '../compose/song.js';
import { OpenAIGenerationService } from '../generation/service.js';
import { writeMidiFile } from '../midi/renderMidi.js';

const DEFAULT_OUTPUT = 'generated_song.mid';

async function readPrompt(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question('Enter your song idea: ')).trim();
  } finally {
    rl.close();
  }
}

async function main() {
  const outPath = resolve(process.argv[2] ?? DEFAULT_OUTPUT);
  const config = loadConfig();

  const prompt = await readPrompt();
  if (!prompt) {
    console.error('Usage: tsx src/cli/generate-song.ts [out.mid]  (song idea on stdin)');
    process.exit(1);
  }

  const service = new OpenAIGenerationService(config.openai);
  const song = await createSong(prompt, { service });
  if (!song.ok) {
    console.error(`Failed to generate song: ${song.error.message}`);
    process.exit(1);
  }

  const accepted = song.value.outcomes.filter(o => o.status === 'accepted').length;
  const bytes = await writeMidiFile(song.value.score, outPath);
  console.log(`Wrote ${outPath} (${accepted}/${song.value.outcomes.length} parts, ${bytes.length} bytes)`);
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
