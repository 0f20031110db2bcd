import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import MidiWriter from 'midi-writer-js';
import type { Part, Score } from '../types/score.js';

/** midi-writer-js writes files at 128 ticks per quarter note. */
export const TICKS_PER_QUARTER = 128;

export interface TimedNote {
  midi: number;
  startTick: number;
  durationTicks: number;
  velocity: number;
}

const PITCH_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'];

/** Key number as scientific pitch text, middle C = "C4". */
export function pitchText(midi: number): string {
  const n = Math.max(0, Math.min(127, Math.round(midi)));
  return `${PITCH_NAMES[n % 12]}${Math.floor(n / 12) - 1}`;
}

export function toTicks(quarters: number): number {
  return Math.max(0, Math.round(quarters * TICKS_PER_QUARTER));
}

/** 1..127 onto the writer's 1..100 scale. */
export function writerVelocity(velocity: number): number {
  return Math.max(1, Math.min(100, Math.round((velocity * 100) / 127)));
}

/** Flattens a part into absolute-tick notes, one per chord tone, ordered by start then pitch. */
export function timedNotes(part: Part): TimedNote[] {
  const notes: TimedNote[] = [];
  for (const measure of part.measures) {
    for (const event of measure.events) {
      if (event.kind !== 'note') continue;
      const durationTicks = toTicks(event.duration);
      if (durationTicks === 0) continue;
      const startTick = toTicks(measure.offset + event.offset);
      for (const pitch of event.pitches) {
        notes.push({ midi: pitch.midi, startTick, durationTicks, velocity: event.velocity });
      }
    }
  }
  return notes.sort((a, b) => (a.startTick === b.startTick ? a.midi - b.midi : a.startTick - b.startTick));
}

function partTrack(part: Part) {
  const track = new MidiWriter.Track();
  track.addTrackName(part.instrument);
  track.addInstrumentName(part.instrument);
  if (!part.percussion && part.program !== null) {
    track.addEvent(new MidiWriter.ProgramChangeEvent({ instrument: part.program, channel: part.channel, delta: 0 }));
  }
  for (const note of timedNotes(part)) {
    track.addEvent(
      new MidiWriter.NoteEvent({
        pitch: [pitchText(note.midi)],
        duration: `T${note.durationTicks}`,
        startTick: note.startTick,
        velocity: writerVelocity(note.velocity),
        channel: part.channel,
      }),
    );
  }
  return track;
}

/** Standard MIDI File bytes: a conductor track, then one track per part. */
export function renderMidi(score: Score): Uint8Array {
  const conductor = new MidiWriter.Track();
  conductor.addTrackName('Conductor');
  conductor.setTempo(score.tempo);
  conductor.setTimeSignature(score.timeSignature.numerator, score.timeSignature.denominator, 24, 8);

  const tracks = [conductor, ...score.parts.map(partTrack)];
  return new MidiWriter.Writer(tracks).buildFile();
}

export async function writeMidiFile(score: Score, path: string): Promise<Uint8Array> {
  const bytes = renderMidi(score);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, bytes);
  return bytes;
}
