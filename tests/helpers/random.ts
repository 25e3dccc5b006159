import type { RandomSource } from '../../src/assignment/random.js'

/**
 * Retorna los valores dados en orden (módulo maxExclusive)
 * Al agotarse repite el último
 */
export function sequenceRandom(values: number[]): RandomSource & { calls: number[] } {
  let index = 0
  const calls: number[] = []
  return {
    calls,
    nextInt(maxExclusive: number): number {
      calls.push(maxExclusive)
      const value = values[Math.min(index, values.length - 1)] ?? 0
      index++
      return value % maxExclusive
    },
  }
}

/**
 * PRNG determinista (mulberry32) para tests de distribución
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    nextInt(maxExclusive: number): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      const float = ((t ^ (t >>> 14)) >>> 0) / 4294967296
      return Math.floor(float * maxExclusive)
    },
  }
}
