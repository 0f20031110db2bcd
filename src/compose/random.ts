/** Source of uniform numbers in [0, 1). */
export interface RandomSource {
  next(): number;
}

export const systemRandom: RandomSource = { next: () => Math.random() };

export function xorshift32(state: { seed: number }): number {
  let x = state.seed;
  x ^= x << 13;
  x ^= x >> 17;
  x ^= x << 5;
  state.seed = x;
  return (x >>> 0) / 4294967296.0;
}

/** Deterministic source for replays and tests. A zero seed would stick at zero. */
export function seededRandom(seed: number): RandomSource {
  const state = { seed: seed | 0 || 0x9e3779b9 };
  return { next: () => xorshift32(state) };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function randomUniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}
