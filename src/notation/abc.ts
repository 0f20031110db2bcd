/**
 * ABC notation reader for the subset the generator emits.
 *
 * Handles header fields (M, L, K; others are skipped), notes with
 * accidentals and octave marks, rests (z, x, Z), chords, ties, broken
 * rhythm, tuplets, bar lines with repeat and volta markers, inline fields,
 * and skips decorations, grace notes, slurs and quoted text. Produces
 * measures of timed events in quarter notes.
 */

import { NotationParseError, err, ok, type Result } from '../errors.js';
import type { Measure, NoteEvent, Pitch, ScoreEvent, Step, TimeSignatureMark } from '../types/score.js';
import { parseKey, type KeySignature } from './keys.js';

export interface AbcHeader {
  meter: TimeSignatureMark;
  unitLength: number;     // quarter notes per unit (L:1/8 -> 0.5)
  key: KeySignature;
}

export interface ParsedTune {
  header: AbcHeader;
  measures: Measure[];
}

const STEPS: readonly Step[] = ['C', 'D', 'E', 'F', 'G', 'A', 'B'];
const STEP_SEMITONES: Record<Step, number> = { C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11 };
const DECORATION_SHORTHANDS = new Set(['.', '~', 'H', 'L', 'M', 'O', 'P', 'S', 'T', 'u', 'v']);
const IGNORED = new Set([' ', '\t', '`', '\\', '$', 'y', '(', ')']);
const DEFAULT_TUPLET_SPAN: Record<number, number> = { 2: 3, 3: 2, 4: 3, 6: 2, 8: 3 };

export function parseMeter(value: string): TimeSignatureMark | null {
  const text = value.trim();
  if (text === 'C') return { numerator: 4, denominator: 4 };
  if (text === 'C|') return { numerator: 2, denominator: 2 };
  const match = /^(\d+)\s*\/\s*(\d+)$/.exec(text);
  if (!match) return null;
  const numerator = Number(match[1]);
  const denominator = Number(match[2]);
  if (numerator <= 0 || denominator <= 0) return null;
  return { numerator, denominator };
}

export function measureLength(meter: TimeSignatureMark): number {
  return (meter.numerator * 4) / meter.denominator;
}

function parseUnitLength(value: string): number | null {
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
  if (!match) return null;
  const num = Number(match[1]);
  const den = Number(match[2]);
  if (num <= 0 || den <= 0) return null;
  return (num / den) * 4;
}

export function midiFor(step: Step, alter: number, octave: number): number {
  return 12 * (octave + 1) + STEP_SEMITONES[step] + alter;
}

interface PendingTuplet {
  factor: number;
  remaining: number;
}

class AbcReader {
  private header: AbcHeader = {
    meter: { numerator: 4, denominator: 4 },
    unitLength: 0.5,
    key: parseKey('C'),
  };
  private unitLengthSet = false;

  private measures: Measure[] = [];
  private current: ScoreEvent[] = [];
  private cursor = 0;

  private measureAccidentals = new Map<string, number>();
  private pendingStartRepeat = false;
  private activeEnding: number[] | undefined;

  private lastEvent: ScoreEvent | null = null;
  private tiePending = false;
  private brokenFactor: number | null = null;
  private tuplet: PendingTuplet | null = null;

  private text = '';
  private pos = 0;
  private lineNo = 0;

  read(source: string): ParsedTune {
    const lines = source.split('\n');
    for (let i = 0; i < lines.length; i++) {
      this.lineNo = i + 1;
      const line = lines[i].replace(/\r$/, '');
      if (/^[A-Za-z]:/.test(line)) {
        this.applyField(line[0], line.slice(2));
        continue;
      }
      this.readBody(line);
    }
    if (this.current.length > 0) this.closeMeasure();
    return { header: this.header, measures: this.measures };
  }

  private fail(message: string): never {
    throw new NotationParseError(message, this.lineNo, this.pos + 1);
  }

  private applyField(field: string, value: string): void {
    switch (field) {
      case 'M': {
        const meter = parseMeter(value);
        if (meter) {
          this.header.meter = meter;
          if (!this.unitLengthSet) {
            this.header.unitLength = measureLength(meter) < 3 ? 0.25 : 0.5;
          }
        }
        break;
      }
      case 'L': {
        const unit = parseUnitLength(value);
        if (unit === null) this.fail(`Invalid unit note length "${value.trim()}"`);
        this.header.unitLength = unit;
        this.unitLengthSet = true;
        break;
      }
      case 'K':
        this.header.key = parseKey(value);
        break;
      default:
        // X, T, V, Q, w and friends carry nothing this reader needs
        break;
    }
  }

  // ── Body ────────────────────────────────────────────────────────

  private readBody(line: string): void {
    this.text = line;
    this.pos = 0;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];

      if (ch === '%') return;
      if (IGNORED.has(ch) && !(ch === '(' && this.isDigit(this.pos + 1))) {
        this.pos++;
        continue;
      }
      if (ch === '(') {
        this.readTuplet();
        continue;
      }
      if (ch === '"') {
        this.skipPast('"', true);
        continue;
      }
      if (ch === '!' || ch === '+') {
        this.skipPast(ch, false);
        continue;
      }
      if (ch === '{') {
        this.skipPast('}', false);
        continue;
      }
      if (DECORATION_SHORTHANDS.has(ch)) {
        this.pos++;
        continue;
      }
      if (ch === '-') {
        this.tiePending = this.lastEvent?.kind === 'note';
        this.pos++;
        continue;
      }
      if (ch === '>' || ch === '<') {
        this.readBrokenRhythm(ch);
        continue;
      }
      if (ch === '|' || (ch === ':' && this.isBarChar(this.pos + 1)) || (ch === '[' && this.text[this.pos + 1] === '|')) {
        this.readBar();
        continue;
      }
      if (ch === '[' && this.isDigit(this.pos + 1)) {
        this.pos++;
        this.startEnding();
        continue;
      }
      if (ch === '[' && /^[A-Za-z]:/.test(this.text.slice(this.pos + 1, this.pos + 3))) {
        this.readInlineField();
        continue;
      }
      if (ch === '[') {
        this.readChord();
        continue;
      }
      if (ch === 'z' || ch === 'x') {
        this.pos++;
        this.pushRest(this.readDuration() * this.header.unitLength);
        continue;
      }
      if (ch === 'Z') {
        this.pos++;
        this.readMultiMeasureRest();
        continue;
      }
      if (this.startsNote(this.pos)) {
        const { pitch, length } = this.readNote();
        this.pushNote([pitch], length * this.header.unitLength);
        continue;
      }
      this.fail(`Unexpected character '${ch}'`);
    }
  }

  private isDigit(index: number): boolean {
    const c = this.text[index];
    return c !== undefined && c >= '0' && c <= '9';
  }

  private isBarChar(index: number): boolean {
    const c = this.text[index];
    return c === '|' || c === ':';
  }

  private startsNote(index: number): boolean {
    let i = index;
    while (this.text[i] === '^' || this.text[i] === '_' || this.text[i] === '=') i++;
    const c = this.text[i];
    return c !== undefined && /[A-Ga-g]/.test(c);
  }

  private skipPast(terminator: string, toEndOfLine: boolean): void {
    const end = this.text.indexOf(terminator, this.pos + 1);
    if (end === -1) {
      if (toEndOfLine) {
        this.pos = this.text.length;
        return;
      }
      this.fail(`Unterminated '${this.text[this.pos]}'`);
    }
    this.pos = end + 1;
  }

  private readInlineField(): void {
    const end = this.text.indexOf(']', this.pos);
    if (end === -1) this.fail('Unterminated inline field');
    const body = this.text.slice(this.pos + 1, end);
    this.applyField(body[0], body.slice(2));
    this.pos = end + 1;
  }

  private readNumber(): number | null {
    const start = this.pos;
    while (this.isDigit(this.pos)) this.pos++;
    return this.pos > start ? Number(this.text.slice(start, this.pos)) : null;
  }

  /** Duration multiplier of the default unit: "", "2", "/", "//", "3/2", "/4". */
  private readDuration(): number {
    const num = this.readNumber() ?? 1;
    let slashes = 0;
    while (this.text[this.pos] === '/') {
      slashes++;
      this.pos++;
    }
    if (slashes === 0) {
      if (num === 0) this.fail('Zero-length note');
      return num;
    }
    const den = this.readNumber() ?? 2 ** slashes;
    if (den === 0 || num === 0) this.fail('Zero-length note');
    return num / den;
  }

  private readNote(): { pitch: Pitch; length: number } {
    let explicit: number | null = null;
    while (this.text[this.pos] === '^' || this.text[this.pos] === '_' || this.text[this.pos] === '=') {
      const c = this.text[this.pos];
      explicit = (explicit ?? 0) + (c === '^' ? 1 : c === '_' ? -1 : 0);
      this.pos++;
    }

    const letter = this.text[this.pos];
    this.pos++;
    const step = STEPS.find(s => s === letter.toUpperCase());
    if (!step) this.fail(`Invalid note letter '${letter}'`);
    let octave = letter === letter.toUpperCase() ? 4 : 5;
    while (this.text[this.pos] === "'" || this.text[this.pos] === ',') {
      octave += this.text[this.pos] === "'" ? 1 : -1;
      this.pos++;
    }

    const accidentalKey = `${step}${octave}`;
    if (explicit !== null) this.measureAccidentals.set(accidentalKey, explicit);
    const alter = this.measureAccidentals.get(accidentalKey) ?? this.header.key.accidentals[step] ?? 0;

    const length = this.readDuration();
    return { pitch: { step, alter, octave, midi: midiFor(step, alter, octave) }, length };
  }

  private readChord(): void {
    this.pos++; // [
    const pitches: Pitch[] = [];
    let length: number | null = null;
    while (this.pos < this.text.length && this.text[this.pos] !== ']') {
      const ch = this.text[this.pos];
      if (this.startsNote(this.pos)) {
        const note = this.readNote();
        pitches.push(note.pitch);
        length ??= note.length;
        continue;
      }
      if (ch === '!' || ch === '+') {
        this.skipPast(ch, false);
        continue;
      }
      if (ch === '"') {
        this.skipPast('"', true);
        continue;
      }
      if (ch === ' ' || ch === '-' || DECORATION_SHORTHANDS.has(ch)) {
        this.pos++;
        continue;
      }
      this.fail(`Unexpected character '${ch}' in chord`);
    }
    if (this.text[this.pos] !== ']') this.fail('Unterminated chord');
    this.pos++;
    const multiplier = this.readDuration();
    if (pitches.length === 0) return;
    this.pushNote(pitches, (length ?? 1) * multiplier * this.header.unitLength);
  }

  private readTuplet(): void {
    this.pos++; // (
    const p = this.readNumber() ?? 3;
    let q: number | null = null;
    let r: number | null = null;
    if (this.text[this.pos] === ':') {
      this.pos++;
      q = this.readNumber();
      if (this.text[this.pos] === ':') {
        this.pos++;
        r = this.readNumber();
      }
    }
    const compound = this.header.meter.numerator % 3 === 0 && this.header.meter.numerator > 3;
    const span = q ?? DEFAULT_TUPLET_SPAN[p] ?? (compound ? 3 : 2);
    if (p <= 0) this.fail('Invalid tuplet');
    this.tuplet = { factor: span / p, remaining: r ?? p };
  }

  private readBrokenRhythm(ch: '>' | '<'): void {
    let count = 0;
    while (this.text[this.pos] === ch) {
      count++;
      this.pos++;
    }
    const last = this.lastEvent;
    if (!last) this.fail('Broken rhythm without a preceding note');
    const shrink = 0.5 ** count;
    const grow = 2 - shrink;
    const previousFactor = ch === '>' ? grow : shrink;
    const delta = last.duration * previousFactor - last.duration;
    last.duration += delta;
    this.cursor += delta;
    this.brokenFactor = ch === '>' ? shrink : grow;
  }

  private readMultiMeasureRest(): void {
    const count = this.readNumber() ?? 1;
    const length = measureLength(this.header.meter);
    for (let i = 0; i < count; i++) {
      if (i > 0) this.closeMeasure();
      this.pushRest(length, false);
    }
  }

  // ── Events ──────────────────────────────────────────────────────

  private scale(duration: number): number {
    let out = duration;
    if (this.brokenFactor !== null) {
      out *= this.brokenFactor;
      this.brokenFactor = null;
    }
    if (this.tuplet) {
      out *= this.tuplet.factor;
      this.tuplet.remaining--;
      if (this.tuplet.remaining <= 0) this.tuplet = null;
    }
    return out;
  }

  private pushNote(pitches: Pitch[], rawDuration: number): void {
    const duration = this.scale(rawDuration);
    const last = this.lastEvent;
    if (this.tiePending && last?.kind === 'note' && samePitches(last.pitches, pitches)) {
      last.duration += duration;
      this.cursor += duration;
      this.tiePending = false;
      return;
    }
    this.tiePending = false;
    const event: NoteEvent = { kind: 'note', pitches, duration, offset: this.cursor, velocity: 64 };
    this.current.push(event);
    this.lastEvent = event;
    this.cursor += duration;
  }

  private pushRest(rawDuration: number, scaled = true): void {
    const duration = scaled ? this.scale(rawDuration) : rawDuration;
    this.tiePending = false;
    const event: ScoreEvent = { kind: 'rest', duration, offset: this.cursor };
    this.current.push(event);
    this.lastEvent = event;
    this.cursor += duration;
  }

  // ── Bars ────────────────────────────────────────────────────────

  private readBar(): void {
    const start = this.pos;
    if (this.text[this.pos] === '[') this.pos++;
    while (this.pos < this.text.length && '|:]'.includes(this.text[this.pos])) {
      // "]" only belongs to the bar right after a "|" ("|]")
      if (this.text[this.pos] === ']' && this.text[this.pos - 1] !== '|') break;
      this.pos++;
    }
    const bar = this.text.slice(start, this.pos);

    const endRepeat = bar.startsWith(':');
    const startRepeat = bar.endsWith(':');
    const thick = bar.includes('||') || bar.includes('|]') || bar.includes('[|');

    this.closeMeasure(endRepeat);
    if (endRepeat || thick || startRepeat) this.activeEnding = undefined;
    if (startRepeat) this.pendingStartRepeat = true;

    if (this.isDigit(this.pos)) this.startEnding();
  }

  private startEnding(): void {
    const start = this.pos;
    while (this.pos < this.text.length && /[0-9,\-]/.test(this.text[this.pos])) this.pos++;
    const numbers: number[] = [];
    for (const piece of this.text.slice(start, this.pos).split(',')) {
      const [from, to] = piece.split('-').map(Number);
      if (!Number.isFinite(from)) continue;
      const last = Number.isFinite(to) ? to : from;
      for (let n = from; n <= last; n++) numbers.push(n);
    }
    if (numbers.length === 0) this.fail('Invalid volta ending');
    this.activeEnding = numbers;
  }

  private closeMeasure(endRepeat = false): void {
    if (this.current.length === 0) {
      const previous = this.measures[this.measures.length - 1];
      if (endRepeat && previous) previous.endRepeat = true;
      return;
    }
    const offset = this.measures.reduce((sum, m) => sum + m.duration, 0);
    const measure: Measure = {
      number: this.measures.length + 1,
      offset,
      duration: this.cursor,
      events: this.current,
    };
    if (this.pendingStartRepeat) measure.startRepeat = true;
    if (endRepeat) measure.endRepeat = true;
    if (this.activeEnding) measure.ending = [...this.activeEnding];
    this.measures.push(measure);

    this.pendingStartRepeat = false;
    this.current = [];
    this.cursor = 0;
    this.measureAccidentals.clear();
    this.lastEvent = null;
    this.tiePending = false;
  }
}

function samePitches(a: Pitch[], b: Pitch[]): boolean {
  return a.length === b.length && a.every((p, i) => p.midi === b[i].midi);
}

export function parseAbc(source: string): Result<ParsedTune, NotationParseError> {
  try {
    return ok(new AbcReader().read(source));
  } catch (e) {
    if (e instanceof NotationParseError) return err(e);
    throw e;
  }
}
