/**
 * Seeded pseudo-random number generator (mulberry32).
 * Returns a function yielding floats in [0, 1).
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Derive a 32-bit seed from arbitrary parts (FNV-1a), so every
 * (seed, symbol, stream) triple gets an independent generator
 */
export function hashSeed(...parts: (string | number)[]): number {
  let hash = 0x811c9dc5;
  for (const char of parts.join(':')) {
    hash ^= char.charCodeAt(0);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Generate a random number from a normal distribution (Box-Muller transform)
 */
export function randomNormal(mean: number = 0, stdDev: number = 1, rng: () => number = Math.random): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + stdDev * z;
}

/**
 * Calculate Geometric Brownian Motion return
 * GBM: dS = μSdt + σSdW
 * Returns the fractional change for one step
 */
export function gbmReturn(
  volatility: number,
  drift: number = 0,
  dt: number = 1,
  rng: () => number = Math.random
): number {
  const z = randomNormal(0, 1, rng);
  return drift * dt + volatility * Math.sqrt(dt) * z;
}

/**
 * Calculate the next price using GBM
 */
export function gbmNextPrice(
  currentPrice: number,
  volatility: number,
  drift: number = 0,
  dt: number = 1,
  rng: () => number = Math.random
): number {
  return currentPrice * (1 + gbmReturn(volatility, drift, dt, rng));
}
