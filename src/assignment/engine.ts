import { errors, isDomainError } from '../domain/errors.js'
import type { PullRequest, UserPullRequests } from '../domain/models.js'
import type { Repositories, TransactionManager } from '../repositories/types.js'
import { logger } from '../utils/logger.js'
import {
  createSearchContext,
  findReplacementCandidates,
  type CandidatePoolStrategy,
} from './candidates.js'
import { mathRandomSource, type RandomSource } from './random.js'
import { pickOne, selectReviewers } from './selector.js'
import { defaultCandidateStrategies } from './strategies/index.js'

export const DEFAULT_REVIEWERS_PER_PR = 2

export interface AssignmentEngineOptions {
  repositories: Repositories
  transactions: TransactionManager
  random?: RandomSource
  strategies?: CandidatePoolStrategy[]
  reviewersPerPr?: number
}

export interface ReassignResult {
  pr: PullRequest
  replacedBy: string
}

export class AssignmentEngine {
  private readonly repositories: Repositories
  private readonly transactions: TransactionManager
  private readonly random: RandomSource
  private readonly strategies: CandidatePoolStrategy[]
  private readonly reviewersPerPr: number

  constructor(options: AssignmentEngineOptions) {
    this.repositories = options.repositories
    this.transactions = options.transactions
    this.random = options.random ?? mathRandomSource
    this.strategies = options.strategies ?? defaultCandidateStrategies()
    this.reviewersPerPr = options.reviewersPerPr ?? DEFAULT_REVIEWERS_PER_PR
  }

  /**
   * Crea un PR y asigna hasta `reviewersPerPr` reviewers activos del equipo del autor
   * El PR y sus reviewers se escriben en una sola transacción
   */
  async createPullRequest(
    prId: string,
    prName: string,
    authorId: string
  ): Promise<PullRequest> {
    const { users, pullRequests } = this.repositories

    if (await pullRequests.exists(prId)) {
      throw errors.prExists()
    }

    const author = await users.get(authorId)
    const teamMembers = await users.getByTeam(author.teamName)

    const reviewers = selectReviewers(
      teamMembers,
      new Set([authorId]),
      this.reviewersPerPr,
      this.random
    )

    const pr: PullRequest = {
      pullRequestId: prId,
      pullRequestName: prName,
      authorId,
      status: 'OPEN',
      assignedReviewers: [],
      createdAt: new Date(),
      mergedAt: null,
    }

    try {
      await this.transactions.withinTransaction(async (repos) => {
        await repos.pullRequests.create(pr)
        if (reviewers.length > 0) {
          await repos.pullRequests.assignReviewers(prId, reviewers)
        }
      })
    } catch (error) {
      if (!isDomainError(error)) {
        logger.error({ error, prId }, 'Failed to create pull request')
      }
      throw error
    }

    if (reviewers.length > 0) {
      logger.info({ prId, authorId, reviewers }, 'Pull request created with reviewers')
    } else {
      logger.warn({ prId, authorId, teamName: author.teamName }, 'Pull request created without reviewers, no eligible team members')
    }

    return { ...pr, assignedReviewers: reviewers }
  }

  /**
   * Idempotente: un PR ya mergeado se retorna sin cambios
   */
  async mergePullRequest(prId: string): Promise<PullRequest> {
    const pr = await this.repositories.pullRequests.merge(prId)
    logger.info({ prId, mergedAt: pr.mergedAt }, 'Pull request merged')
    return pr
  }

  /**
   * Reemplaza un reviewer por otro candidato elegido al azar
   * Sin candidatos en ningún tier falla con NO_CANDIDATE
   */
  async reassignReviewer(prId: string, oldReviewerId: string): Promise<ReassignResult> {
    const { users, pullRequests } = this.repositories

    const pr = await pullRequests.get(prId)

    if (pr.status === 'MERGED') {
      throw errors.prMerged()
    }

    if (!pr.assignedReviewers.includes(oldReviewerId)) {
      throw errors.notAssigned()
    }

    const oldReviewer = await users.get(oldReviewerId)
    const context = createSearchContext(pr, pr.assignedReviewers, oldReviewer, users)
    const found = await findReplacementCandidates(this.strategies, context)
    const newReviewerId = found ? pickOne(found.candidates, this.random) : null

    if (!found || !newReviewerId) {
      logger.info({ prId, oldReviewerId }, 'No replacement candidate for reviewer')
      throw errors.noCandidate()
    }

    await pullRequests.reassignReviewer(prId, oldReviewerId, newReviewerId)

    logger.info({
      prId,
      oldReviewer: oldReviewerId,
      newReviewer: newReviewerId,
      tier: found.tier,
    }, 'Reviewer reassigned')

    return {
      pr: {
        ...pr,
        assignedReviewers: pr.assignedReviewers.map(id => (id === oldReviewerId ? newReviewerId : id)),
      },
      replacedBy: newReviewerId,
    }
  }

  /**
   * PRs donde el usuario es reviewer
   * Un usuario inexistente retorna lista vacía
   */
  async getUserReviews(userId: string): Promise<UserPullRequests> {
    try {
      await this.repositories.users.get(userId)
    } catch (error) {
      if (isDomainError(error, 'NOT_FOUND')) {
        return { userId, pullRequests: [] }
      }
      throw error
    }

    const pullRequests = await this.repositories.pullRequests.getByReviewer(userId)
    return { userId, pullRequests }
  }
}
