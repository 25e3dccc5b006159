import { errors } from '../domain/errors.js'
import type { User } from '../domain/models.js'
import type { Repositories } from '../repositories/types.js'
import { logger } from '../utils/logger.js'
import {
  createSearchContext,
  findReplacementCandidates,
  type CandidatePoolStrategy,
} from './candidates.js'
import { defaultCandidateStrategies } from './strategies/index.js'
import { mathRandomSource, type RandomSource } from './random.js'
import { pickOne } from './selector.js'

export interface BulkDeactivateResult {
  deactivatedUsers: string[]
  reassignedPrs: number
  errors: number
}

export interface BulkDeactivateOptions {
  /** Al abortarse, el loop se detiene antes del siguiente usuario o PR */
  signal?: AbortSignal
}

export interface DeactivationEngineOptions {
  repositories: Repositories
  random?: RandomSource
  strategies?: CandidatePoolStrategy[]
}

/**
 * Desactivación de usuarios con liberación de sus reviews abiertas
 *
 * A diferencia de reassignReviewer, aquí "sin candidatos" no es un error:
 * el reviewer se quita sin reemplazo y cuenta como éxito
 */
export class DeactivationEngine {
  private readonly repositories: Repositories
  private readonly random: RandomSource
  private readonly strategies: CandidatePoolStrategy[]

  constructor(options: DeactivationEngineOptions) {
    this.repositories = options.repositories
    this.random = options.random ?? mathRandomSource
    this.strategies = options.strategies ?? defaultCandidateStrategies()
  }

  /**
   * Desactiva a todos los miembros activos del equipo y reasigna sus PRs abiertos
   *
   * La desactivación es atómica (un solo UPDATE). La reasignación es
   * secuencial y best-effort: un fallo por PR suma a `errors` y se continúa.
   */
  async bulkDeactivateTeam(
    teamName: string,
    options: BulkDeactivateOptions = {}
  ): Promise<BulkDeactivateResult> {
    const { users, pullRequests } = this.repositories
    const { signal } = options
    const start = Date.now()

    logger.info({ teamName }, 'Bulk deactivating team members')

    const allMembers = await users.getByTeam(teamName)
    if (allMembers.length === 0) {
      throw errors.notFound(`team ${teamName} not found`)
    }

    if (!allMembers.some(member => member.isActive)) {
      logger.info({ teamName }, 'No active users to deactivate')
      return { deactivatedUsers: [], reassignedPrs: 0, errors: 0 }
    }

    signal?.throwIfAborted()

    const deactivatedUsers = await users.bulkDeactivateByTeam(teamName)

    logger.info({
      teamName,
      count: deactivatedUsers.length,
      userIds: deactivatedUsers,
    }, 'Team members deactivated')

    let reassignedPrs = 0
    let reassignErrors = 0
    let aborted = false

    for (const userId of deactivatedUsers) {
      if (aborted) {
        break
      }
      if (signal?.aborted) {
        logger.warn({ teamName, userId }, 'Bulk deactivation aborted, stopping reassignment loop')
        aborted = true
        break
      }

      let openPRs: string[]
      try {
        openPRs = await pullRequests.getOpenByReviewer(userId)
      } catch (error) {
        logger.error({ error, userId }, 'Failed to get open PRs for user')
        reassignErrors++
        continue
      }

      if (openPRs.length > 0) {
        logger.info({ userId, count: openPRs.length }, 'Found open PRs for deactivated user')
      }

      for (const prId of openPRs) {
        if (signal?.aborted) {
          logger.warn({ teamName, prId }, 'Bulk deactivation aborted, stopping reassignment loop')
          aborted = true
          break
        }

        try {
          await this.releaseReview(prId, { userId, teamName })
          reassignedPrs++
        } catch (error) {
          logger.error({ error, prId, userId }, 'Failed to reassign reviewer')
          reassignErrors++
        }
      }
    }

    logger.info({
      teamName,
      deactivated: deactivatedUsers.length,
      reassignedPrs,
      errors: reassignErrors,
      aborted,
      elapsedMs: Date.now() - start,
    }, 'Bulk deactivation completed')

    return {
      deactivatedUsers,
      reassignedPrs,
      errors: reassignErrors,
    }
  }

  /**
   * Cambia el flag de actividad de un usuario
   * Al desactivar a un usuario activo primero libera sus reviews abiertas
   */
  async setIsActive(userId: string, isActive: boolean): Promise<User> {
    const { users, pullRequests } = this.repositories

    const user = await users.get(userId)

    if (!isActive && user.isActive) {
      try {
        const openPRs = await pullRequests.getOpenByReviewer(userId)
        for (const prId of openPRs) {
          try {
            await this.releaseReview(prId, user)
          } catch (error) {
            // La desactivación sigue aunque falle un PR
            logger.error({ error, prId, userId }, 'Failed to reassign reviewer')
          }
        }
      } catch (error) {
        logger.error({ error, userId }, 'Failed to reassign user PRs')
      }
    }

    await users.setIsActive(userId, isActive)

    logger.info({ userId, isActive }, 'User active status updated')

    return { ...user, isActive }
  }

  /**
   * Reemplaza al reviewer en un PR, o lo quita si no hay candidatos en ningún tier
   */
  private async releaseReview(
    prId: string,
    reviewer: Pick<User, 'userId' | 'teamName'>
  ): Promise<void> {
    const { users, pullRequests } = this.repositories

    const pr = await pullRequests.get(prId)
    const context = createSearchContext(pr, pr.assignedReviewers, reviewer, users)
    const found = await findReplacementCandidates(this.strategies, context)
    const newReviewerId = found ? pickOne(found.candidates, this.random) : null

    if (!found || !newReviewerId) {
      logger.warn({ prId, oldReviewer: reviewer.userId }, 'No candidates for reassignment, removing reviewer without replacement')
      await pullRequests.removeReviewer(prId, reviewer.userId)
      return
    }

    await pullRequests.reassignReviewer(prId, reviewer.userId, newReviewerId)

    logger.info({
      prId,
      oldReviewer: reviewer.userId,
      newReviewer: newReviewerId,
      tier: found.tier,
    }, 'Reviewer reassigned')
  }
}
