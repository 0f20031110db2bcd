import { UpstreamFormatError, errorMessage } from '../errors.js';
import { PARAMETERS_SYSTEM_PROMPT } from '../generation/prompts.js';
import type { GenerationService } from '../generation/service.js';
import type { MusicalParameters } from '../types/params.js';
import { decodeJsonResponse } from './json.js';
import { RawParametersSchema, type RawParameters } from './schema.js';

export const TEMPO_RANGE = { min: 90, max: 140 } as const;
export const MEASURES_RANGE = { min: 64, max: 128 } as const;

export const DEFAULT_PARAMETERS: MusicalParameters = Object.freeze({
  tempo: 120,
  timeSignature: '4/4',
  key: 'C',
  measures: 64,
  form: 'Intro-Verse-Chorus-Verse-Chorus-Bridge-Chorus-Outro',
  chordProgression: Object.freeze(['C', 'G', 'Am', 'F']),
  scale: 'major',
  style: 'pop',
});

export type ResolvedParameters =
  | { source: 'service'; params: MusicalParameters }
  | { source: 'default'; params: MusicalParameters; error: Error };

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(Math.round(value), max));
}

function isValidTimeSignature(value: string): boolean {
  const match = /^(\d+)\/(\d+)$/.exec(value);
  if (!match) return false;
  const numerator = Number(match[1]);
  const denominator = Number(match[2]);
  return numerator > 0 && numerator <= 32 && [1, 2, 4, 8, 16, 32].includes(denominator);
}

/**
 * Fills missing fields from defaults and clamps tempo and measure count.
 * Accepts anything; a non-object reads as all fields missing.
 */
export function validateParameters(raw: unknown): MusicalParameters {
  const parsed = RawParametersSchema.safeParse(raw);
  const fields: RawParameters = parsed.success ? parsed.data : {};
  const d = DEFAULT_PARAMETERS;

  const timeSignature = fields.time_signature?.replace(/\s+/g, '');
  const key = fields.key && /^[A-Ga-g]/.test(fields.key) ? fields.key : undefined;

  return Object.freeze({
    tempo: clamp(fields.tempo ?? d.tempo, TEMPO_RANGE.min, TEMPO_RANGE.max),
    timeSignature: timeSignature && isValidTimeSignature(timeSignature) ? timeSignature : d.timeSignature,
    key: key ?? d.key,
    measures: clamp(fields.measures ?? d.measures, MEASURES_RANGE.min, MEASURES_RANGE.max),
    form: fields.form ?? d.form,
    chordProgression: Object.freeze([...(fields.chord_progression ?? d.chordProgression)]),
    scale: fields.scale ?? d.scale,
    style: fields.style ?? d.style,
  });
}

export async function resolveMusicalParameters(
  prompt: string,
  service: GenerationService,
): Promise<ResolvedParameters> {
  let text: string;
  try {
    text = await service.complete({
      system: PARAMETERS_SYSTEM_PROMPT,
      prompt,
      maxTokens: 500,
      temperature: 0.5,
      topP: 0.9,
    });
  } catch (e) {
    console.error(`[params] Error determining musical parameters: ${errorMessage(e)}`);
    return { source: 'default', params: DEFAULT_PARAMETERS, error: e instanceof Error ? e : new Error(String(e)) };
  }

  const decoded = decodeJsonResponse(text);
  if (!decoded.ok) {
    console.error(`[params] ${decoded.error.message}`);
    return { source: 'default', params: DEFAULT_PARAMETERS, error: decoded.error };
  }
  if (typeof decoded.value !== 'object' || decoded.value === null || Array.isArray(decoded.value)) {
    const error = new UpstreamFormatError('Parameters response is not a JSON object');
    console.error(`[params] ${error.message}`);
    return { source: 'default', params: DEFAULT_PARAMETERS, error };
  }

  return { source: 'service', params: validateParameters(decoded.value) };
}
