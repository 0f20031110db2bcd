import { GenerationError, PipelineError, err, errorMessage, ok, type Result } from '../errors.js';
import type { GenerationService } from '../generation/service.js';
import { describeInstrumentation, resolveInstrumentation } from '../resolve/instruments.js';
import { resolveMusicalParameters } from '../resolve/parameters.js';
import type { Instrumentation, MusicalParameters } from '../types/params.js';
import type { Score } from '../types/score.js';
import { systemRandom, type RandomSource } from './random.js';
import { synthesizeScore, type InstrumentOutcome } from './synthesizer.js';

export interface Song {
  prompt: string;
  params: MusicalParameters;
  paramsSource: 'service' | 'default';
  instrumentation: Instrumentation;
  instrumentationSource: 'service' | 'default';
  score: Score;
  outcomes: InstrumentOutcome[];
}

export interface CreateSongOptions {
  service: GenerationService;
  random?: RandomSource;
}

async function composeSong(prompt: string, service: GenerationService, random: RandomSource): Promise<Result<Song, PipelineError>> {
  const params = await resolveMusicalParameters(prompt, service);
  console.log('[song] Selected musical parameters:');
  for (const [name, value] of Object.entries(params.params)) {
    console.log(`[song]   ${name}: ${Array.isArray(value) ? value.join(' ') : String(value)}`);
  }

  const instrumentation = await resolveInstrumentation(prompt, service);
  console.log(`[song] Selected instruments: ${describeInstrumentation(instrumentation.instrumentation)}`);

  const synthesized = await synthesizeScore(prompt, params.params, instrumentation.instrumentation, { service, random });
  if (!synthesized.ok) return synthesized;

  return ok({
    prompt,
    params: params.params,
    paramsSource: params.source,
    instrumentation: instrumentation.instrumentation,
    instrumentationSource: instrumentation.source,
    score: synthesized.value.score,
    outcomes: synthesized.value.outcomes,
  });
}

/** Prompt to finished score. Fails only when no usable part came back. */
export async function createSong(prompt: string, options: CreateSongOptions): Promise<Result<Song, PipelineError>> {
  try {
    return await composeSong(prompt, options.service, options.random ?? systemRandom);
  } catch (e) {
    console.error(`[song] Error generating song: ${errorMessage(e)}`);
    return err(e instanceof PipelineError ? e : new GenerationError(errorMessage(e), { cause: e }));
  }
}
