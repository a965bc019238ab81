// Returns a float in [0, 1), like Math.random
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

// mulberry32; the seed is taken modulo 2^32
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Helper to pick a random element from a non-empty array
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  const value = random();
  const scaled = Number.isFinite(value) ? Math.floor(value * items.length) : 0;
  const index = Math.min(Math.max(scaled, 0), items.length - 1);
  return items[index];
}
