import type { PullRequest, User } from '../domain/models.js'
import type { UserRepository } from '../repositories/types.js'
import { logger } from '../utils/logger.js'
import { filterCandidates } from './selector.js'

export type CandidateTier = 'reviewer-team' | 'author-team' | 'other-teams'

export interface CandidateSearchContext {
  pr: PullRequest
  /** Reviewers actuales del PR (incluye al reemplazado) */
  currentReviewers: readonly string[]
  replacedReviewer: Pick<User, 'userId' | 'teamName'>
  users: UserRepository
  /** Equipos ya recorridos por tiers anteriores */
  searchedTeams: Set<string>
  /** Lookup perezoso del autor, se resuelve una sola vez */
  getAuthor(): Promise<User>
}

/**
 * Proveedor de un pool de candidatos
 * Retorna null si el tier no aplica (p.ej. el equipo ya fue recorrido)
 */
export interface CandidatePoolStrategy {
  readonly tier: CandidateTier
  pool(context: CandidateSearchContext): Promise<User[] | null>
}

export interface CandidateSearchResult {
  tier: CandidateTier
  candidates: string[]
}

export function createSearchContext(
  pr: PullRequest,
  currentReviewers: readonly string[],
  replacedReviewer: Pick<User, 'userId' | 'teamName'>,
  users: UserRepository
): CandidateSearchContext {
  let author: Promise<User> | null = null

  return {
    pr,
    currentReviewers,
    replacedReviewer,
    users,
    searchedTeams: new Set<string>(),
    getAuthor() {
      if (!author) {
        author = users.get(pr.authorId)
      }
      return author
    },
  }
}

/**
 * Recorre los tiers en orden y se detiene en el primero con candidatos
 * Exclusiones en todos los tiers: autor, reviewers actuales y el reemplazado
 */
export async function findReplacementCandidates(
  strategies: readonly CandidatePoolStrategy[],
  context: CandidateSearchContext
): Promise<CandidateSearchResult | null> {
  const excluded = new Set<string>([
    context.pr.authorId,
    context.replacedReviewer.userId,
    ...context.currentReviewers,
  ])

  for (const strategy of strategies) {
    const pool = await strategy.pool(context)
    if (pool === null) {
      logger.debug({ prId: context.pr.pullRequestId, tier: strategy.tier }, 'Candidate tier skipped')
      continue
    }

    const candidates = filterCandidates(pool, excluded)

    logger.debug({
      prId: context.pr.pullRequestId,
      tier: strategy.tier,
      poolSize: pool.length,
      candidates,
    }, 'Evaluated candidate tier')

    if (candidates.length > 0) {
      return { tier: strategy.tier, candidates }
    }
  }

  return null
}
