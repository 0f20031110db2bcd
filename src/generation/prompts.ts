import type { InstrumentName, MusicalParameters } from '../types/params.js';
import { PERCUSSION_INSTRUMENT } from '../types/params.js';
import { PERCUSSION_SYMBOL_NAMES } from '../compose/percussion.js';

export const PARAMETERS_SYSTEM_PROMPT = `You are a professional music theorist and composer. Analyze the user's prompt and determine appropriate musical parameters for a polished, radio-ready production.

Return ONLY a valid JSON object with these parameters (no comments):
{
    "tempo": <integer between 90-140>,
    "time_signature": "<numerator>/<denominator>",
    "key": "<key letter>[m]",
    "measures": <integer between 64-128>,
    "form": "<standard song form, sections joined by ->",
    "chord_progression": [<array of chord symbols>],
    "scale": "<scale type>",
    "style": "<musical style>"
}
`;

export const INSTRUMENTS_SYSTEM_PROMPT = `You are a music arranger for a polished, radio-ready production. Analyze the prompt and choose appropriate instruments to create a rich, balanced track.

Return ONLY a valid JSON object with instrument groups and their MIDI channels. Format:
{
    "rhythm": [["DrumSet", 10], ["ElectricBass", 1]],
    "harmony": [["Piano", 2]],
    "lead": [["SynthLead", 3]],
    "accompaniment": [["Violin", 4]],
    "backing_vocals": [["VoiceOohs", 5]]
}

Only use these instruments: Piano, Violin, ElectricBass, DrumSet, SynthLead, VoiceOohs.
DrumSet must always use channel 10.
`;

const drumLegend = Object.entries(PERCUSSION_SYMBOL_NAMES)
  .map(([symbol, name]) => `${symbol} (${name})`)
  .join(', ');

export function composerSystemPrompt(params: MusicalParameters): string {
  return `You are a professional music composer creating valid ABC notation for a polished, radio-ready song. Follow these requirements strictly:

1. Compose music that follows the ${params.scale} scale and the given chord progression.
2. Style: ${params.style} with professional-level rhythmic patterns, realistic phrasing, and tasteful ornamentation.
3. Use proper voice leading and maintain cohesive thematic development.
4. Include dynamics (mp, mf, f) and articulations (staccato, legato, accents).
5. The song form: ${params.form}. Follow the sections in order.
6. Establish a memorable melodic theme for verses and a catchy, dynamic hook for choruses.
7. Use repetition and variation to create coherence, and slight rhythmic complexity for interest.
8. Exactly ${params.measures} measures.
9. Key: ${params.key}.
10. Time Signature: ${params.timeSignature}.
11. Include M:, L:, and K: headers as the first three lines after X:1.
12. Output ONLY valid ABC notation with no additional text.
13. For drum parts, use only these notes: ${drumLegend}, and z for rests.
`;
}

export function instrumentPrompt(instrument: InstrumentName, params: MusicalParameters): string {
  const progression = params.chordProgression.join(', ');
  if (instrument === PERCUSSION_INSTRUMENT) {
    return (
      `Craft ${params.measures} measures of professional drum patterns in ${params.timeSignature} ` +
      `for a ${params.style} style song, following [${progression}] and ${params.form}. ` +
      `Use tasteful variations, realistic fills, and appropriate dynamics. ` +
      `Only use ${Object.keys(PERCUSSION_SYMBOL_NAMES).join(',')} notes and z rests.`
    );
  }
  return (
    `Craft ${params.measures} measures of a ${instrument} part for a ${params.style} song. ` +
    `Key: ${params.key}, Time: ${params.timeSignature}, Form: ${params.form} with chord progression [${progression}]. ` +
    `Include dynamics, articulations, and tasteful melodic/harmonic content. ` +
    `Make the result professional, cohesive, and radio-ready.\n` +
    `Ensure M:, L:, and K: headers are present at the start, and produce ONLY ABC notation.`
  );
}
