import type { InstrumentName } from './params.js';

export type Step = 'C' | 'D' | 'E' | 'F' | 'G' | 'A' | 'B';

export interface Pitch {
  step: Step;
  alter: number;          // semitones, -2..2
  octave: number;         // scientific octave (middle C = C4)
  midi: number;           // key number; remapped for percussion
}

/** Durations and offsets are in quarter notes. Offsets are measure-relative. */
export interface NoteEvent {
  kind: 'note';
  pitches: Pitch[];       // >1 for chords
  duration: number;
  offset: number;
  velocity: number;       // 1..127
}

export interface RestEvent {
  kind: 'rest';
  duration: number;
  offset: number;
}

export type ScoreEvent = NoteEvent | RestEvent;

export interface Measure {
  number: number;         // 1-based
  offset: number;         // start within the part
  duration: number;
  events: ScoreEvent[];
  startRepeat?: boolean;
  endRepeat?: boolean;
  ending?: number[];      // volta numbers this measure belongs to
}

export interface Part {
  id: string;
  instrument: InstrumentName;
  channel: number;        // 1..16
  program: number | null; // GM program; null for percussion
  percussion: boolean;
  measures: Measure[];
}

export interface TimeSignatureMark {
  numerator: number;
  denominator: number;
}

export interface Score {
  tempo: number;          // quarter-note bpm
  timeSignature: TimeSignatureMark;
  parts: Part[];
}

export function partEvents(part: Part): ScoreEvent[] {
  return part.measures.flatMap(m => m.events);
}

export function countEvents(part: Part): number {
  let count = 0;
  for (const m of part.measures) count += m.events.length;
  return count;
}
