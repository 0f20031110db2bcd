import type { CompletionRequest, GenerationService } from '../src/generation/service.js';
import type { Measure, NoteEvent, Part, Pitch, Step } from '../src/types/score.js';
import type { Song } from '../src/compose/song.js';
import { midiFor } from '../src/notation/abc.js';
import { DEFAULT_INSTRUMENTATION } from '../src/resolve/instruments.js';
import { DEFAULT_PARAMETERS } from '../src/resolve/parameters.js';

/** Answers each call with the next scripted reply; an Error reply is thrown. */
export class ScriptedService implements GenerationService {
  readonly requests: CompletionRequest[] = [];
  private replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function pitch(step: Step, octave = 4, alter = 0): Pitch {
  return { step, alter, octave, midi: midiFor(step, alter, octave) };
}

export function note(p: Pitch, offset: number, duration = 1): NoteEvent {
  return { kind: 'note', pitches: [p], duration, offset, velocity: 64 };
}

/** `count` 4/4 measures, each holding a note on beat 1 and beat 3. */
export function evenPart(count: number): Part {
  const measures: Measure[] = [];
  for (let i = 0; i < count; i++) {
    measures.push({
      number: i + 1,
      offset: i * 4,
      duration: 4,
      events: [note(pitch('C'), 0, 2), note(pitch('E'), 2, 2)],
    });
  }
  return { id: 'Piano', instrument: 'Piano', channel: 1, program: 0, percussion: false, measures };
}

export function sampleSong(prompt = 'night drive'): Song {
  return {
    prompt,
    params: DEFAULT_PARAMETERS,
    paramsSource: 'service',
    instrumentation: DEFAULT_INSTRUMENTATION,
    instrumentationSource: 'default',
    score: { tempo: 120, timeSignature: { numerator: 4, denominator: 4 }, parts: [evenPart(2)] },
    outcomes: [
      { role: 'rhythm', instrument: 'DrumSet', channel: 10, status: 'skipped', code: 'EMPTY_PART', reason: 'empty' },
      { role: 'harmony', instrument: 'Piano', channel: 1, status: 'accepted', events: 4, measures: 2 },
    ],
  };
}
