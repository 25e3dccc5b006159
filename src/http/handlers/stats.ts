import type { FastifyReply, FastifyRequest } from 'fastify'
import { sendError } from '../errors.js'
import type { AppServices } from '../types.js'

export async function handleGetStats(
  _request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const stats = await services.stats.getStats()

    return reply.code(200).send({
      pr_stats: {
        total_prs: stats.prStats.totalPrs,
        open_prs: stats.prStats.openPrs,
        merged_prs: stats.prStats.mergedPrs,
        avg_reviewers_per_pr: stats.prStats.avgReviewersPerPr,
      },
      user_stats: Object.fromEntries(
        Object.entries(stats.userStats).map(([userId, user]) => [
          userId,
          {
            user_id: user.userId,
            username: user.username,
            total_assignments: user.totalAssignments,
            open_prs: user.openPrs,
            merged_prs: user.mergedPrs,
          },
        ])
      ),
    })
  } catch (error) {
    return sendError(reply, error)
  }
}
