export type RandomSource = () => number;

/** mulberry32; returns values in [0, 1). */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function resolveRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}

export function pickUniform<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  const picked = items[index];
  if (picked === undefined) {
    throw new Error(`Index ${index} missing from list`);
  }
  return picked;
}
