import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_INSTRUMENTATION,
  describeInstrumentation,
  resolveInstrumentation,
  validateInstrumentation,
} from '../../src/resolve/instruments.js';
import { ScriptedService } from '../fakes.js';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('validateInstrumentation', () => {
  it('replaces the whole mapping when a required role is missing', () => {
    const resolved = validateInstrumentation({
      rhythm: [['DrumSet', 10]],
      harmony: [['Piano', 2]],
      accompaniment: [['Violin', 4]],
    });
    expect(resolved.source).toBe('default');
    expect(resolved.instrumentation).toBe(DEFAULT_INSTRUMENTATION);
  });

  it('pins the drum kit to channel 10 and drops unknown instruments', () => {
    const resolved = validateInstrumentation({
      rhythm: [['DrumSet', 3], ['Electric Bass', 1]],
      harmony: [['piano', '2']],
      lead: [['Kazoo', 4], ['SynthLead', 20]],
    });
    expect(resolved).toEqual({
      source: 'service',
      instrumentation: [
        { role: 'rhythm', instruments: [{ instrument: 'DrumSet', channel: 10 }, { instrument: 'ElectricBass', channel: 1 }] },
        { role: 'harmony', instruments: [{ instrument: 'Piano', channel: 2 }] },
        { role: 'lead', instruments: [{ instrument: 'SynthLead', channel: 16 }] },
      ],
      dropped: ['Kazoo'],
    });
  });

  it('falls back when nothing usable is named', () => {
    const resolved = validateInstrumentation({ rhythm: [['Tuba', 1]], harmony: 'Piano', lead: [] });
    expect(resolved.source).toBe('default');
  });

  it('falls back on arrays and scalars', () => {
    expect(validateInstrumentation([['Piano', 1]]).source).toBe('default');
    expect(validateInstrumentation('Piano').source).toBe('default');
  });
});

describe('resolveInstrumentation', () => {
  it('decodes the service answer', async () => {
    const service = new ScriptedService([
      '{"rhythm": [["DrumSet", 10]], "harmony": [["Piano", 2]], "lead": [["Violin", 3]]}',
    ]);
    const resolved = await resolveInstrumentation('chill beats', service);
    expect(resolved.source).toBe('service');
    expect(describeInstrumentation(resolved.instrumentation)).toBe(
      'rhythm: DrumSet@10; harmony: Piano@2; lead: Violin@3',
    );
  });

  it('uses the default mapping on bad JSON or a failed call', async () => {
    expect((await resolveInstrumentation('x', new ScriptedService(['{rhythm: drums}']))).source).toBe('default');
    expect((await resolveInstrumentation('x', new ScriptedService([new Error('offline')]))).source).toBe('default');
  });

  it('keeps the default mapping complete', () => {
    expect(DEFAULT_INSTRUMENTATION.map(g => g.role)).toEqual(['rhythm', 'harmony', 'lead', 'accompaniment', 'backing_vocals']);
    expect(DEFAULT_INSTRUMENTATION[0].instruments[0]).toEqual({ instrument: 'DrumSet', channel: 10 });
  });
});
