import type { UserAssignmentStats } from '../domain/models.js'
import type { Repositories } from '../repositories/types.js'
import { logger } from '../utils/logger.js'

export interface PRStats {
  totalPrs: number
  openPrs: number
  mergedPrs: number
  avgReviewersPerPr: number
}

export interface GlobalStats {
  prStats: PRStats
  userStats: Record<string, UserAssignmentStats>
}

export class StatsService {
  constructor(private readonly repositories: Repositories) {}

  /**
   * Estadísticas de asignación de reviewers
   */
  async getStats(): Promise<GlobalStats> {
    const { pullRequests, users } = this.repositories

    const prStats = await pullRequests.getStats()
    const assignments = await pullRequests.getUserAssignmentStats()

    const userStats: Record<string, UserAssignmentStats> = {}
    for (const [userId, stats] of assignments) {
      let username = 'unknown'
      try {
        username = (await users.get(userId)).username
      } catch (error) {
        logger.warn({ error, userId }, 'Failed to get user info for stats')
      }
      userStats[userId] = { ...stats, username }
    }

    const result: GlobalStats = {
      prStats: {
        totalPrs: prStats.total,
        openPrs: prStats.open,
        mergedPrs: prStats.merged,
        avgReviewersPerPr: Math.round(prStats.avgReviewers * 100) / 100,
      },
      userStats,
    }

    logger.info({
      totalPrs: result.prStats.totalPrs,
      usersWithAssignments: assignments.size,
    }, 'Statistics calculated')

    return result
  }
}
