import {
  EmptyPartError,
  NotationParseError,
  err,
  ok,
  type Result,
} from '../errors.js';
import { parseAbc } from '../notation/abc.js';
import {
  GM_PROGRAMS,
  PERCUSSION_INSTRUMENT,
  type InstrumentName,
  type MusicalParameters,
} from '../types/params.js';
import { countEvents, type Part } from '../types/score.js';
import { remapPercussion } from './percussion.js';
import { randomInt, type RandomSource } from './random.js';

export const DEFAULT_VELOCITY = { min: 65, max: 85 } as const;
export const UNIT_NOTE_LENGTH = '1/8';

/** Lines the builder never keeps from generated text; its own headers replace them. */
const DISCARDED_PREFIXES = ['%', 'X:', 'M:', 'L:', 'K:', 'T:', 'V:'];

/** Info fields such as `w:` lyrics, which the sanitizer may have fenced with a leading bar. */
const FIELD_LINE = /^\|?\s*[A-Za-z]:(?![|:])/;

/** Drum letters are read in C so the key signature never alters them. */
const PERCUSSION_KEY = 'C';

export type PartFailure = NotationParseError | EmptyPartError;

export function canonicalHeaders(params: MusicalParameters, percussion = false): string[] {
  const key = percussion ? PERCUSSION_KEY : params.key;
  return ['X:1', `M:${params.timeSignature}`, `L:${UNIT_NOTE_LENGTH}`, `K:${key}`];
}

/** Drops quoted segments ("Cmaj7", "^text") by keeping the even-indexed pieces between quotes. */
export function stripAnnotations(line: string): string {
  return line
    .split('"')
    .filter((_, i) => i % 2 === 0)
    .join('');
}

/** Content lines that still carry at least one bar line once annotations are gone. */
export function contentLines(notation: string): string[] {
  const lines: string[] = [];
  for (const raw of notation.split('\n')) {
    const line = raw.trim();
    if (!line || DISCARDED_PREFIXES.some(prefix => line.startsWith(prefix))) continue;
    if (FIELD_LINE.test(line)) continue;
    const music = stripAnnotations(line);
    if (music.includes('|')) lines.push(music);
  }
  return lines;
}

/**
 * Builds a playable part from sanitized notation. Parameters always win
 * over whatever headers the generator wrote. Drum kits are remapped onto
 * percussion keys; every note starts with a velocity in the default band.
 */
export function buildPart(
  notation: string,
  instrument: InstrumentName,
  channel: number,
  params: MusicalParameters,
  random: RandomSource,
): Result<Part, PartFailure> {
  const lines = contentLines(notation);
  if (lines.length === 0) return err(new EmptyPartError(instrument));

  const percussion = instrument === PERCUSSION_INSTRUMENT;
  const parsed = parseAbc([...canonicalHeaders(params, percussion), ...lines].join('\n'));
  if (!parsed.ok) return parsed;

  const part: Part = {
    id: instrument,
    instrument,
    channel,
    program: GM_PROGRAMS[instrument],
    percussion,
    measures: parsed.value.measures,
  };

  if (countEvents(part) === 0) return err(new EmptyPartError(instrument));

  for (const measure of part.measures) {
    for (const event of measure.events) {
      if (event.kind === 'note') event.velocity = randomInt(random, DEFAULT_VELOCITY.min, DEFAULT_VELOCITY.max);
    }
  }

  return ok(percussion ? remapPercussion(part) : part);
}
