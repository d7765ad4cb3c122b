// Random source for the synthetic perplexity draws
export interface RandomSource {
  /** Uniform value in [0, 1). */
  next(): number;
}

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

// mulberry32: small 32-bit generator, enough to pin a series in tests
export const seededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
};

export const uniform = (random: RandomSource, min: number, max: number): number =>
  min + (max - min) * random.next();
