export const INSTRUMENT_NAMES = [
  'Piano',
  'Violin',
  'ElectricBass',
  'DrumSet',
  'SynthLead',
  'VoiceOohs',
] as const;

export type InstrumentName = typeof INSTRUMENT_NAMES[number];

export const PERCUSSION_INSTRUMENT: InstrumentName = 'DrumSet';
export const PERCUSSION_CHANNEL = 10;

/** General MIDI program numbers (0-based). Percussion has none. */
export const GM_PROGRAMS: Record<InstrumentName, number | null> = {
  Piano: 0,
  Violin: 40,
  ElectricBass: 33,
  DrumSet: null,
  SynthLead: 80,   // Lead 1 (square)
  VoiceOohs: 52,   // Choir Aahs
};

export interface MusicalParameters {
  readonly tempo: number;             // 90..140
  readonly timeSignature: string;     // "N/D"
  readonly key: string;               // e.g. "C", "F#m"
  readonly measures: number;          // 64..128
  readonly form: string;              // section tokens joined by "-"
  readonly chordProgression: readonly string[];
  readonly scale: string;
  readonly style: string;
}

/** rhythm, harmony, lead, accompaniment, backing_vocals, or whatever the arranger adds. */
export type InstrumentRole = string;

export const REQUIRED_ROLES: readonly InstrumentRole[] = ['rhythm', 'harmony', 'lead'];

export interface InstrumentSlot {
  readonly instrument: InstrumentName;
  readonly channel: number;           // 1..16
}

export interface InstrumentGroup {
  readonly role: InstrumentRole;
  readonly instruments: readonly InstrumentSlot[];
}

/** Roles in the order the arranger returned them. */
export type Instrumentation = readonly InstrumentGroup[];
