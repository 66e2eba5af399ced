export interface RandomDraw {
  value: number;
  nextSeed: number;
}

// mulberry32 step over a 32-bit seed
function nextUnitInterval(seed: number): { unit: number; nextSeed: number } {
  const nextSeed = (seed + 0x6d2b79f5) >>> 0;
  let t = nextSeed;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  const unit = ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  return { unit, nextSeed };
}

/**
 * Draws an integer uniformly from `[1, max]` and returns the advanced seed.
 */
export function drawEntryNumber(seed: number, max: number): RandomDraw {
  const { unit, nextSeed } = nextUnitInterval(seed);
  const upper = Math.max(1, Math.floor(max));
  return { value: 1 + Math.floor(unit * upper), nextSeed };
}

export function normalizeSeed(seed: number): number {
  return Number.isFinite(seed) ? Math.trunc(seed) >>> 0 : 0;
}
