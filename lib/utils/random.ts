import type { RandomSource } from '../types'

/**
 * mulberry32: small, fast, deterministic for a given 32-bit seed
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomChoice<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new Error('Cannot choose from an empty list')
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[index]
}

// Uniform in [-bound, +bound]
export function randomSymmetric(bound: number, random: RandomSource): number {
  return (random() * 2 - 1) * bound
}
