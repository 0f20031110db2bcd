import type { Step } from '../types/score.js';

export type KeyAccidentals = Partial<Record<Step, number>>;

const SHARP_ORDER: Step[] = ['F', 'C', 'G', 'D', 'A', 'E', 'B'];
const FLAT_ORDER: Step[] = ['B', 'E', 'A', 'D', 'G', 'C', 'F'];

/** Sharps (positive) or flats (negative) of each major tonic. */
const MAJOR_FIFTHS: Record<string, number> = {
  'Cb': -7, 'Gb': -6, 'Db': -5, 'Ab': -4, 'Eb': -3, 'Bb': -2, 'F': -1,
  'C': 0, 'G': 1, 'D': 2, 'A': 3, 'E': 4, 'B': 5, 'F#': 6, 'C#': 7,
  // enharmonic spellings the generator sometimes uses for major keys
  'G#': -4, 'D#': -3, 'A#': -2, 'E#': -1, 'Fb': 4,
};

/** Fifths offset of each mode relative to its parallel major. */
const MODE_OFFSETS: Array<[string, number]> = [
  ['maj', 0], ['ion', 0], ['aeo', -3],
  ['mix', -1], ['dor', -2], ['phr', -4], ['lyd', 1], ['loc', -5],
];

function parseMode(word: string): [string, number] {
  if (word === 'm' || word.startsWith('min')) return ['min', -3];
  for (const [prefix, fifths] of MODE_OFFSETS) {
    if (word.startsWith(prefix)) return [prefix, fifths];
  }
  return ['maj', 0];
}

export interface KeySignature {
  tonic: string;
  mode: string;
  fifths: number;
  accidentals: KeyAccidentals;
}

/**
 * Parses an ABC `K:` value such as `C`, `Am`, `F#m`, `Bb`, `Dmix` or
 * `E minor`. Anything unrecognized falls back to C major, as does `none`.
 */
export function parseKey(value: string): KeySignature {
  const text = value.trim().replace(/\s+/g, ' ');
  const match = /^([A-Ga-g])([#b]?)\s*([A-Za-z]*)/.exec(text);
  if (!match || text.toLowerCase().startsWith('none')) {
    return { tonic: 'C', mode: 'maj', fifths: 0, accidentals: {} };
  }

  const tonic = match[1].toUpperCase() + match[2];
  const [mode, offset] = parseMode(match[3].toLowerCase());

  const majorFifths = MAJOR_FIFTHS[tonic] ?? 0;
  let fifths = majorFifths + offset;
  if (fifths > 7) fifths -= 12;
  if (fifths < -7) fifths += 12;

  return { tonic, mode, fifths, accidentals: accidentalsFor(fifths) };
}

export function accidentalsFor(fifths: number): KeyAccidentals {
  const accidentals: KeyAccidentals = {};
  if (fifths > 0) {
    for (const step of SHARP_ORDER.slice(0, fifths)) accidentals[step] = 1;
  } else if (fifths < 0) {
    for (const step of FLAT_ORDER.slice(0, -fifths)) accidentals[step] = -1;
  }
  return accidentals;
}
