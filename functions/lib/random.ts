/**
 * Seeded pseudo-random generators
 *
 * Every consumer of randomness (hash table generation, difficulty noise,
 * top-K sampling) takes one of these explicitly so sequences can be replayed.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number

/**
 * Mulberry32: a small 32-bit generator, good enough for hashing tables and play noise.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), 1 | t)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Draws a uniform float in [min, max).
 */
export function randomInRange(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min)
}

/**
 * Picks one element uniformly at random.
 *
 * @throws Error if `items` is empty
 */
export function pickRandom<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list')
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[index]
}
