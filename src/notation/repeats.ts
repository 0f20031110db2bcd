import type { Measure, ScoreEvent } from '../types/score.js';

function cloneEvent(event: ScoreEvent): ScoreEvent {
  return event.kind === 'note'
    ? { ...event, pitches: event.pitches.map(p => ({ ...p })) }
    : { ...event };
}

function playsOnPass(measure: Measure, pass: number): boolean {
  return measure.ending === undefined || measure.ending.includes(pass);
}

/**
 * Unrolls repeat bars and first/second endings into a flat run of measures.
 *
 * Each repeated section is played twice. Endings are honoured by pass
 * number; nested repeats are not. The result carries no repeat or ending
 * markers and is renumbered from 1 with contiguous offsets.
 */
export function expandRepeats(measures: readonly Measure[]): Measure[] {
  const unrolled: Measure[] = [];
  let sectionStart = 0;
  let pass = 1;
  let inEndings = false;
  let i = 0;

  while (i < measures.length) {
    const measure = measures[i];

    if (pass === 2 && inEndings && measure.ending === undefined) {
      pass = 1;
      sectionStart = i;
    }
    if (measure.startRepeat && pass === 1) sectionStart = i;
    inEndings = measure.ending !== undefined;

    const plays = playsOnPass(measure, pass);
    if (plays) unrolled.push(measure);

    if (measure.endRepeat && plays) {
      if (pass === 1) {
        pass = 2;
        i = sectionStart;
        inEndings = false;
        continue;
      }
      pass = 1;
      sectionStart = i + 1;
    }
    i++;
  }

  let offset = 0;
  return unrolled.map((measure, index) => {
    const copy: Measure = {
      number: index + 1,
      offset,
      duration: measure.duration,
      events: measure.events.map(cloneEvent),
    };
    offset += measure.duration;
    return copy;
  });
}

export function hasRepeatMarkers(measures: readonly Measure[]): boolean {
  return measures.some(m => m.startRepeat || m.endRepeat || m.ending !== undefined);
}
