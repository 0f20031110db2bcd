import { UpstreamFormatError, errorMessage } from '../errors.js';
import { INSTRUMENTS_SYSTEM_PROMPT } from '../generation/prompts.js';
import type { GenerationService } from '../generation/service.js';
import {
  INSTRUMENT_NAMES,
  PERCUSSION_CHANNEL,
  PERCUSSION_INSTRUMENT,
  REQUIRED_ROLES,
  type InstrumentGroup,
  type InstrumentName,
  type InstrumentSlot,
  type Instrumentation,
} from '../types/params.js';
import { decodeJsonResponse } from './json.js';
import { InstrumentListSchema, InstrumentPairSchema, RawInstrumentationSchema } from './schema.js';

export const DEFAULT_INSTRUMENTATION: Instrumentation = [
  { role: 'rhythm', instruments: [{ instrument: 'DrumSet', channel: 10 }, { instrument: 'ElectricBass', channel: 1 }] },
  { role: 'harmony', instruments: [{ instrument: 'Piano', channel: 2 }] },
  { role: 'lead', instruments: [{ instrument: 'SynthLead', channel: 3 }] },
  { role: 'accompaniment', instruments: [{ instrument: 'Violin', channel: 4 }] },
  { role: 'backing_vocals', instruments: [{ instrument: 'VoiceOohs', channel: 5 }] },
];

export type ResolvedInstrumentation =
  | { source: 'service'; instrumentation: Instrumentation; dropped: string[] }
  | { source: 'default'; instrumentation: Instrumentation; error: Error };

function matchInstrument(name: string): InstrumentName | undefined {
  const wanted = name.replace(/[\s_-]/g, '').toLowerCase();
  return INSTRUMENT_NAMES.find(known => known.toLowerCase() === wanted);
}

function toSlot(entry: unknown): InstrumentSlot | string {
  const pair = InstrumentPairSchema.safeParse(entry);
  if (!pair.success) return JSON.stringify(entry) ?? String(entry);
  const [name, channel] = pair.data;
  const instrument = matchInstrument(name);
  if (!instrument) return name;
  if (instrument === PERCUSSION_INSTRUMENT) return { instrument, channel: PERCUSSION_CHANNEL };
  return { instrument, channel: Math.max(1, Math.min(16, Math.round(channel))) };
}

function fallback(error: Error): ResolvedInstrumentation {
  console.warn(`[instruments] ${error.message}; using default instrumentation`);
  return { source: 'default', instrumentation: DEFAULT_INSTRUMENTATION, error };
}

/**
 * Turns a decoded arranger response into an instrumentation. The response
 * must name every required role, otherwise the whole mapping is replaced
 * by the default one. Unknown instruments are dropped and the drum kit is
 * pinned to the percussion channel.
 */
export function validateInstrumentation(raw: unknown): ResolvedInstrumentation {
  const record = RawInstrumentationSchema.safeParse(raw);
  if (!record.success || Array.isArray(raw)) {
    return fallback(new UpstreamFormatError('Instrumentation response is not a JSON object'));
  }

  const missing = REQUIRED_ROLES.filter(role => !(role in record.data));
  if (missing.length > 0) {
    return fallback(new UpstreamFormatError(`Missing required instrument groups: ${missing.join(', ')}`));
  }

  const groups: InstrumentGroup[] = [];
  const dropped: string[] = [];
  for (const [role, value] of Object.entries(record.data)) {
    const list = InstrumentListSchema.safeParse(value);
    const instruments: InstrumentSlot[] = [];
    for (const entry of list.success ? list.data : []) {
      const slot = toSlot(entry);
      if (typeof slot === 'string') dropped.push(slot);
      else instruments.push(slot);
    }
    groups.push({ role, instruments });
  }

  if (groups.every(g => g.instruments.length === 0)) {
    return fallback(new UpstreamFormatError('Instrumentation response names no known instruments'));
  }
  if (dropped.length > 0) {
    console.warn(`[instruments] Dropped unusable entries: ${dropped.join(', ')}`);
  }
  return { source: 'service', instrumentation: groups, dropped };
}

export async function resolveInstrumentation(
  prompt: string,
  service: GenerationService,
): Promise<ResolvedInstrumentation> {
  let text: string;
  try {
    text = await service.complete({
      system: INSTRUMENTS_SYSTEM_PROMPT,
      prompt,
      maxTokens: 500,
      temperature: 0.5,
      topP: 0.9,
    });
  } catch (e) {
    console.error(`[instruments] Error determining instruments: ${errorMessage(e)}`);
    return { source: 'default', instrumentation: DEFAULT_INSTRUMENTATION, error: e instanceof Error ? e : new Error(String(e)) };
  }

  const decoded = decodeJsonResponse(text);
  if (!decoded.ok) return fallback(decoded.error);
  return validateInstrumentation(decoded.value);
}

export function describeInstrumentation(instrumentation: Instrumentation): string {
  return instrumentation
    .map(g => `${g.role}: ${g.instruments.map(s => `${s.instrument}@${s.channel}`).join(', ') || '-'}`)
    .join('; ');
}
