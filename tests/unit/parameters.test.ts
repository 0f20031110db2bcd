import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UpstreamFormatError } from '../../src/errors.js';
import { decodeJsonResponse } from '../../src/resolve/json.js';
import {
  DEFAULT_PARAMETERS,
  resolveMusicalParameters,
  validateParameters,
} from '../../src/resolve/parameters.js';
import { ScriptedService } from '../fakes.js';

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

describe('decodeJsonResponse', () => {
  it('drops code fences and comment lines', () => {
    const decoded = decodeJsonResponse('```json\n{\n  // pick a tempo\n  "tempo": 100\n}\n```');
    expect(decoded).toEqual({ ok: true, value: { tempo: 100 } });
  });

  it('reports undecodable text', () => {
    const decoded = decodeJsonResponse('Sure! tempo is 100');
    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.error).toBeInstanceOf(UpstreamFormatError);
  });
});

describe('validateParameters', () => {
  it('clamps tempo and measure count', () => {
    expect(validateParameters({ tempo: 200, measures: 10 })).toMatchObject({ tempo: 140, measures: 64 });
    expect(validateParameters({ tempo: 40, measures: 500 })).toMatchObject({ tempo: 90, measures: 128 });
  });

  it('accepts loosely typed fields', () => {
    expect(
      validateParameters({
        tempo: '95.6',
        time_signature: '3 / 4',
        key: 'Am',
        measures: 80,
        form: ['Verse', 'Chorus'],
        chord_progression: ['Am', 'F', 'C', 'G'],
        scale: 'minor',
        style: 'ballad',
      }),
    ).toEqual({
      tempo: 96,
      timeSignature: '3/4',
      key: 'Am',
      measures: 80,
      form: 'Verse-Chorus',
      chordProgression: ['Am', 'F', 'C', 'G'],
      scale: 'minor',
      style: 'ballad',
    });
  });

  it('falls back per field on unusable values', () => {
    const params = validateParameters({ tempo: null, time_signature: '4/5', key: 'H', chord_progression: [], style: 7 });
    expect(params).toEqual(DEFAULT_PARAMETERS);
  });

  it('treats non-objects as all fields missing', () => {
    expect(validateParameters('nope')).toEqual(DEFAULT_PARAMETERS);
    expect(validateParameters(null)).toEqual(DEFAULT_PARAMETERS);
  });
});

describe('resolveMusicalParameters', () => {
  it('asks the service and validates the answer', async () => {
    const service = new ScriptedService(['```json\n{"tempo": 100, "key": "D"}\n```']);
    const resolved = await resolveMusicalParameters('a sunny drive', service);
    expect(resolved.source).toBe('service');
    expect(resolved.params).toMatchObject({ tempo: 100, key: 'D', measures: 64 });
    expect(service.requests[0]).toMatchObject({ prompt: 'a sunny drive', maxTokens: 500, temperature: 0.5, topP: 0.9 });
  });

  it('uses defaults when the answer is not JSON', async () => {
    const resolved = await resolveMusicalParameters('x', new ScriptedService(['I think 120 bpm']));
    expect(resolved.source).toBe('default');
    expect(resolved.params).toBe(DEFAULT_PARAMETERS);
    if (resolved.source !== 'default') return;
    expect(resolved.error).toBeInstanceOf(UpstreamFormatError);
  });

  it('uses defaults when the answer is not an object', async () => {
    const resolved = await resolveMusicalParameters('x', new ScriptedService(['[1, 2]']));
    expect(resolved.source).toBe('default');
  });

  it('uses defaults when the service fails', async () => {
    const resolved = await resolveMusicalParameters('x', new ScriptedService([new Error('offline')]));
    expect(resolved.source).toBe('default');
    if (resolved.source !== 'default') return;
    expect(resolved.error.message).toBe('offline');
  });
});
