import type { MusicalParameters } from '../types/params.js';
import type { Part } from '../types/score.js';
import { randomInt, randomUniform, type RandomSource } from './random.js';

export interface VelocityBand {
  min: number;
  max: number;
}

export const VELOCITY_BANDS = {
  verse: { min: 60, max: 75 },
  chorus: { min: 80, max: 100 },
  bridge: { min: 70, max: 85 },
  default: { min: 65, max: 85 },
} as const satisfies Record<string, VelocityBand>;

export const TIMING_JITTER = 0.02; // quarter notes, either direction

const BAND_WORDS: Array<[keyof typeof VELOCITY_BANDS, string[]]> = [
  ['verse', ['verse']],
  ['chorus', ['chorus', 'hook']],
  ['bridge', ['bridge', 'pre-chorus']],
];

export function sectionTokens(form: string): string[] {
  if (!form.trim()) return [''];
  return form.split('-').map(t => t.trim());
}

export function bandForSection(section: string): VelocityBand {
  const lower = section.toLowerCase();
  for (const [band, words] of BAND_WORDS) {
    if (words.some(w => lower.includes(w))) return VELOCITY_BANDS[band];
  }
  return VELOCITY_BANDS.default;
}

/** Section name active at a zero-based measure index; the last section absorbs any remainder. */
export function sectionAt(tokens: readonly string[], totalMeasures: number, index: number): string {
  const sectionLength = Math.max(1, Math.floor(totalMeasures / tokens.length));
  return tokens[Math.min(Math.floor(index / sectionLength), tokens.length - 1)];
}

/**
 * Shapes loudness to follow the song form and loosens timing slightly.
 * Works in place and keeps every event and measure where it was.
 */
export function shapeDynamics(part: Part, params: MusicalParameters, random: RandomSource): Part {
  const tokens = sectionTokens(params.form);

  part.measures.forEach((measure, index) => {
    const band = bandForSection(sectionAt(tokens, params.measures, index));
    for (const event of measure.events) {
      if (event.kind !== 'note') continue;
      event.velocity = randomInt(random, band.min, band.max);
      if (measure.offset + event.offset > 0) {
        event.offset += randomUniform(random, -TIMING_JITTER, TIMING_JITTER);
      }
    }
  });

  return part;
}
