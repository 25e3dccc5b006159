import type { User } from '../domain/models.js'
import type { RandomSource } from './random.js'

/**
 * Reviewer selector: lógica pura, sin efectos secundarios
 *
 * 1. Filtra: miembro activo y fuera del set de exclusión
 * 2. Si quedan <= desired, los retorna todos
 * 3. Si no, elige `desired` distintos de forma uniforme (Fisher-Yates parcial)
 */
export function filterCandidates(
  pool: readonly User[],
  excluded: ReadonlySet<string>
): string[] {
  const seen = new Set<string>()
  const candidates: string[] = []

  for (const member of pool) {
    if (!member.isActive || excluded.has(member.userId) || seen.has(member.userId)) {
      continue
    }
    seen.add(member.userId)
    candidates.push(member.userId)
  }

  return candidates
}

/**
 * Toma `count` elementos distintos sin reemplazo
 * Cada permutación es igual de probable si `random` es uniforme
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource
): T[] {
  const shuffled = [...items]
  const take = Math.min(Math.max(count, 0), shuffled.length)

  for (let i = 0; i < take; i++) {
    const j = i + random.nextInt(shuffled.length - i)
    ;[shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]]
  }

  return shuffled.slice(0, take)
}

export function selectReviewers(
  pool: readonly User[],
  excluded: ReadonlySet<string>,
  desired: number,
  random: RandomSource
): string[] {
  const candidates = filterCandidates(pool, excluded)

  if (candidates.length <= desired) {
    return candidates
  }

  return sampleWithoutReplacement(candidates, desired, random)
}

/**
 * Caso desired = 1 sobre una lista ya filtrada
 */
export function pickOne(candidates: readonly string[], random: RandomSource): string | null {
  const [picked] = sampleWithoutReplacement(candidates, 1, random)
  return picked ?? null
}
