import {
  EmptyPartError,
  GenerationError,
  NoValidPartsError,
  PipelineError,
  err,
  errorMessage,
  ok,
  type PipelineErrorCode,
  type Result,
} from '../errors.js';
import { generateNotation } from '../generation/notation.js';
import { instrumentPrompt } from '../generation/prompts.js';
import type { GenerationService } from '../generation/service.js';
import { parseMeter } from '../notation/abc.js';
import { expandRepeats, hasRepeatMarkers } from '../notation/repeats.js';
import { sanitizeNotation } from '../notation/sanitize.js';
import type { InstrumentRole, InstrumentSlot, Instrumentation, MusicalParameters } from '../types/params.js';
import { countEvents, type Part, type Score } from '../types/score.js';
import { shapeDynamics } from './dynamics.js';
import { buildPart } from './partBuilder.js';
import type { RandomSource } from './random.js';

export interface SynthesisDeps {
  service: GenerationService;
  random: RandomSource;
}

interface OutcomeBase {
  role: InstrumentRole;
  instrument: string;
  channel: number;
}

export type InstrumentOutcome =
  | (OutcomeBase & { status: 'accepted'; events: number; measures: number })
  | (OutcomeBase & { status: 'skipped'; code: PipelineErrorCode; reason: string });

export interface SynthesizedScore {
  score: Score;
  outcomes: InstrumentOutcome[];
}

export function requestFor(prompt: string, slot: InstrumentSlot, params: MusicalParameters): string {
  return `${instrumentPrompt(slot.instrument, params)}\nSong idea: ${prompt}`;
}

/**
 * One instrument end to end: request notation, sanitize, build, remap
 * drums, shape dynamics. Every failure comes back as a value.
 */
export async function generatePart(
  prompt: string,
  slot: InstrumentSlot,
  params: MusicalParameters,
  deps: SynthesisDeps,
): Promise<Result<Part, PipelineError>> {
  const notation = await generateNotation(deps.service, requestFor(prompt, slot, params), params);
  if (!notation.ok) return notation;

  const sanitized = sanitizeNotation(notation.value);
  if (!sanitized) return err(new EmptyPartError(slot.instrument));

  const built = buildPart(sanitized, slot.instrument, slot.channel, params, deps.random);
  if (!built.ok) return built;

  return ok(shapeDynamics(built.value, params, deps.random));
}

async function attemptPart(
  prompt: string,
  slot: InstrumentSlot,
  params: MusicalParameters,
  deps: SynthesisDeps,
): Promise<Result<Part, PipelineError>> {
  try {
    return await generatePart(prompt, slot, params, deps);
  } catch (e) {
    return err(new GenerationError(`Unexpected failure: ${errorMessage(e)}`, { cause: e }));
  }
}

/**
 * Builds every requested part in role order and merges the survivors into
 * one score. Fails only when no instrument produced anything.
 */
export async function synthesizeScore(
  prompt: string,
  params: MusicalParameters,
  instrumentation: Instrumentation,
  deps: SynthesisDeps,
): Promise<Result<SynthesizedScore, NoValidPartsError>> {
  const meter = parseMeter(params.timeSignature) ?? { numerator: 4, denominator: 4 };
  const score: Score = { tempo: params.tempo, timeSignature: meter, parts: [] };
  const outcomes: InstrumentOutcome[] = [];

  for (const group of instrumentation) {
    for (const slot of group.instruments) {
      const base: OutcomeBase = { role: group.role, instrument: slot.instrument, channel: slot.channel };
      console.log(`[song] Generating ${slot.instrument} part (${group.role} group) on channel ${slot.channel}...`);

      const result = await attemptPart(prompt, slot, params, deps);
      if (!result.ok) {
        console.warn(`[part] Skipping ${slot.instrument}: ${result.error.message}`);
        outcomes.push({ ...base, status: 'skipped', code: result.error.code, reason: result.error.message });
        continue;
      }

      const part = result.value;
      const events = countEvents(part);
      if (events === 0) {
        const error = new EmptyPartError(slot.instrument);
        console.warn(`[part] Skipping ${slot.instrument}: ${error.message}`);
        outcomes.push({ ...base, status: 'skipped', code: error.code, reason: error.message });
        continue;
      }

      score.parts.push(part);
      outcomes.push({ ...base, status: 'accepted', events, measures: part.measures.length });
    }
  }

  if (score.parts.length === 0) {
    const error = new NoValidPartsError(outcomes.length);
    console.error(`[song] ${error.message}`);
    return err(error);
  }

  for (const part of score.parts) {
    if (hasRepeatMarkers(part.measures)) console.log(`[song] Expanding repeats in ${part.instrument}`);
    part.measures = expandRepeats(part.measures);
  }

  return ok({ score, outcomes });
}
