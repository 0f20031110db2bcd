import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { pitchText, renderMidi, timedNotes, toTicks, writeMidiFile, writerVelocity } from '../../src/midi/renderMidi.js';
import type { Part, Score } from '../../src/types/score.js';
import { evenPart, note, pitch } from '../fakes.js';

const drums: Part = {
  id: 'DrumSet',
  instrument: 'DrumSet',
  channel: 10,
  program: null,
  percussion: true,
  measures: [{ number: 1, offset: 0, duration: 4, events: [{ ...note(pitch('C'), 0), pitches: [{ ...pitch('C'), midi: 36 }] }] }],
};

const score: Score = { tempo: 110, timeSignature: { numerator: 3, denominator: 4 }, parts: [evenPart(2), drums] };

let dir: string | undefined;

afterEach(() => {
  if (dir) rmSync(dir, { recursive: true, force: true });
  dir = undefined;
});

describe('timing', () => {
  it('converts quarter notes to ticks', () => {
    expect(toTicks(1)).toBe(128);
    expect(toTicks(0.25)).toBe(32);
    expect(toTicks(-0.01)).toBe(0);
  });

  it('names key numbers', () => {
    expect(pitchText(60)).toBe('C4');
    expect(pitchText(61)).toBe('C#4');
    expect(pitchText(35)).toBe('B1');
    expect(pitchText(127)).toBe('G9');
  });

  it('scales velocities onto the writer range', () => {
    expect(writerVelocity(127)).toBe(100);
    expect(writerVelocity(64)).toBe(50);
    expect(writerVelocity(0)).toBe(1);
  });

  it('flattens parts into absolute ticks', () => {
    const part = evenPart(1);
    part.measures[0].offset = 2;
    part.measures[0].events = [
      { kind: 'rest', duration: 0.5, offset: 0 },
      { kind: 'note', pitches: [pitch('G'), pitch('C')], duration: 1, offset: 0.5, velocity: 90 },
    ];
    expect(timedNotes(part)).toEqual([
      { midi: 60, startTick: 320, durationTicks: 128, velocity: 90 },
      { midi: 67, startTick: 320, durationTicks: 128, velocity: 90 },
    ]);
  });
});

describe('renderMidi', () => {
  it('writes a multi-track standard MIDI file header', () => {
    const bytes = renderMidi(score);
    expect([...bytes.slice(0, 4)]).toEqual([0x4d, 0x54, 0x68, 0x64]); // MThd
    expect([...bytes.slice(4, 8)]).toEqual([0, 0, 0, 6]);
    expect([...bytes.slice(8, 10)]).toEqual([0, 1]);
    expect([...bytes.slice(10, 12)]).toEqual([0, 3]);
    expect([...bytes.slice(12, 14)]).toEqual([0, 128]);
    expect([...bytes.slice(14, 18)]).toEqual([0x4d, 0x54, 0x72, 0x6b]); // MTrk
  });

  it('writes the file to disk', async () => {
    dir = mkdtempSync(join(tmpdir(), 'prompt-score-midi-'));
    const path = join(dir, 'nested', 'song.mid');
    const bytes = await writeMidiFile(score, path);
    expect(new Uint8Array(readFileSync(path))).toEqual(bytes);
  });
});
