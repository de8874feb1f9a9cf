/**
 * Random sources
 *
 * All engine randomness (tie-breaks and fallbacks) flows through a
 * RandomSource so that tests can pin it with a seed.
 */

export interface RandomSource {
  /** Returns a float in [0, 1) */
  next(): number
}

/**
 * Seeded PRNG using the mulberry32 algorithm.
 */
export interface SeededRandom extends RandomSource {
  readonly seed: number
}

export function createSeededRandom(seed: number): SeededRandom {
  let state = seed | 0

  function next(): number {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return { next, seed }
}

/**
 * Unseeded source backed by Math.random.
 */
export const defaultRandom: RandomSource = {
  next: () => Math.random(),
}

/**
 * Picks a uniformly random element.
 *
 * @returns The chosen element, or undefined for an empty array
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource = defaultRandom): T | undefined {
  if (items.length === 0) return undefined
  return items[Math.floor(random.next() * items.length)]
}
