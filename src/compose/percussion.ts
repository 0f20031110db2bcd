import type { Part, Pitch } from '../types/score.js';

/**
 * Percussion symbols the generator is asked to use, mapped to General MIDI
 * percussion keys. The rest symbol maps to silence.
 */
export const PERCUSSION_KEYS = {
  C: 36,  // bass drum
  D: 38,  // snare
  E: 42,  // closed hi-hat
  F: 46,  // open hi-hat
  G: 49,  // crash
  A: 51,  // ride
  z: 0,   // rest
} as const;

export const PERCUSSION_FALLBACK_KEY = 35; // acoustic bass drum

export type PercussionSymbol = keyof typeof PERCUSSION_KEYS;

export const PERCUSSION_SYMBOL_NAMES: Record<Exclude<PercussionSymbol, 'z'>, string> = {
  C: 'kick',
  D: 'snare',
  E: 'closed hi-hat',
  F: 'open hi-hat',
  G: 'crash',
  A: 'ride',
};

function pitchName(pitch: Pitch): string {
  if (pitch.alter === 0) return pitch.step;
  return pitch.step + (pitch.alter > 0 ? '#'.repeat(pitch.alter) : '-'.repeat(-pitch.alter));
}

/** Key for a pitch name such as "C" or "F#"; anything outside the table gets the fallback. */
export function percussionKeyFor(name: string): number {
  for (const [symbol, key] of Object.entries(PERCUSSION_KEYS)) {
    if (symbol === name) return key;
  }
  return PERCUSSION_FALLBACK_KEY;
}

/**
 * Rewrites every struck note of a percussion part to its percussion key.
 * Rests stay rests; durations, offsets and measure layout are untouched.
 */
export function remapPercussion(part: Part): Part {
  for (const measure of part.measures) {
    for (const event of measure.events) {
      if (event.kind !== 'note') continue;
      for (const pitch of event.pitches) {
        pitch.midi = percussionKeyFor(pitchName(pitch).toUpperCase());
      }
    }
  }
  return part;
}
