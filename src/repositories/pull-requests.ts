import { and, asc, count, desc, eq, sql } from 'drizzle-orm'
import type { Database } from '../db/client.js'
import { prReviewers, pullRequests, type PullRequestRow } from '../db/schema.js'
import { errors } from '../domain/errors.js'
import type {
  PullRequest,
  PullRequestShort,
  PullRequestStats,
  UserAssignmentStats,
} from '../domain/models.js'
import { getPgErrorCode, PG_FOREIGN_KEY_VIOLATION, PG_UNIQUE_VIOLATION } from './pg-errors.js'
import type { PullRequestRepository } from './types.js'

function toPullRequest(row: PullRequestRow, reviewers: string[]): PullRequest {
  return {
    pullRequestId: row.pullRequestId,
    pullRequestName: row.pullRequestName,
    authorId: row.authorId,
    status: row.status,
    assignedReviewers: reviewers,
    createdAt: row.createdAt,
    mergedAt: row.mergedAt,
  }
}

export class DrizzlePullRequestRepository implements PullRequestRepository {
  constructor(private readonly db: Database) {}

  async create(pr: PullRequest): Promise<void> {
    try {
      await this.db.insert(pullRequests).values({
        pullRequestId: pr.pullRequestId,
        pullRequestName: pr.pullRequestName,
        authorId: pr.authorId,
        status: pr.status,
        createdAt: pr.createdAt ?? new Date(),
      })
    } catch (error) {
      const code = getPgErrorCode(error)
      if (code === PG_UNIQUE_VIOLATION) {
        throw errors.prExists()
      }
      if (code === PG_FOREIGN_KEY_VIOLATION) {
        throw errors.notFound(`author ${pr.authorId} not found`)
      }
      throw error
    }
  }

  async get(prId: string): Promise<PullRequest> {
    const [row] = await this.db
      .select()
      .from(pullRequests)
      .where(eq(pullRequests.pullRequestId, prId))
      .limit(1)

    if (!row) {
      throw errors.notFound(`pull request ${prId} not found`)
    }

    const reviewers = await this.getReviewers(prId)
    return toPullRequest(row, reviewers)
  }

  async exists(prId: string): Promise<boolean> {
    const rows = await this.db
      .select({ pullRequestId: pullRequests.pullRequestId })
      .from(pullRequests)
      .where(eq(pullRequests.pullRequestId, prId))
      .limit(1)

    return rows.length > 0
  }

  async assignReviewers(prId: string, reviewerIds: string[]): Promise<void> {
    if (reviewerIds.length === 0) {
      return
    }

    await this.db
      .insert(prReviewers)
      .values(reviewerIds.map(userId => ({ pullRequestId: prId, userId })))
      .onConflictDoNothing()
  }

  async getReviewers(prId: string): Promise<string[]> {
    const rows = await this.db
      .select({ userId: prReviewers.userId })
      .from(prReviewers)
      .where(eq(prReviewers.pullRequestId, prId))
      .orderBy(asc(prReviewers.assignedAt), asc(prReviewers.userId))

    return rows.map(row => row.userId)
  }

  async removeReviewer(prId: string, reviewerId: string): Promise<void> {
    const removed = await this.db
      .delete(prReviewers)
      .where(and(eq(prReviewers.pullRequestId, prId), eq(prReviewers.userId, reviewerId)))
      .returning({ userId: prReviewers.userId })

    if (removed.length === 0) {
      throw errors.notAssigned()
    }
  }

  async reassignReviewer(prId: string, oldReviewerId: string, newReviewerId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const removed = await tx
        .delete(prReviewers)
        .where(and(eq(prReviewers.pullRequestId, prId), eq(prReviewers.userId, oldReviewerId)))
        .returning({ userId: prReviewers.userId })

      if (removed.length === 0) {
        throw errors.notAssigned()
      }

      await tx.insert(prReviewers).values({ pullRequestId: prId, userId: newReviewerId })
    })
  }

  async getOpenByReviewer(userId: string): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ pullRequestId: pullRequests.pullRequestId })
      .from(pullRequests)
      .innerJoin(prReviewers, eq(prReviewers.pullRequestId, pullRequests.pullRequestId))
      .where(and(eq(prReviewers.userId, userId), eq(pullRequests.status, 'OPEN')))
      .orderBy(asc(pullRequests.pullRequestId))

    return rows.map(row => row.pullRequestId)
  }

  async getByReviewer(userId: string): Promise<PullRequestShort[]> {
    const rows = await this.db
      .select({
        pullRequestId: pullRequests.pullRequestId,
        pullRequestName: pullRequests.pullRequestName,
        authorId: pullRequests.authorId,
        status: pullRequests.status,
      })
      .from(pullRequests)
      .innerJoin(prReviewers, eq(prReviewers.pullRequestId, pullRequests.pullRequestId))
      .where(eq(prReviewers.userId, userId))
      .orderBy(desc(pullRequests.createdAt))

    return rows
  }

  async merge(prId: string): Promise<PullRequest> {
    const current = await this.get(prId)

    // Idempotencia: si ya está mergeado retornamos el estado actual
    if (current.status === 'MERGED') {
      return current
    }

    const [updated] = await this.db
      .update(pullRequests)
      .set({ status: 'MERGED', mergedAt: new Date() })
      .where(and(eq(pullRequests.pullRequestId, prId), eq(pullRequests.status, 'OPEN')))
      .returning()

    if (!updated) {
      // Otro request lo mergeó entre el SELECT y el UPDATE
      return this.get(prId)
    }

    return toPullRequest(updated, current.assignedReviewers)
  }

  async getStats(): Promise<PullRequestStats> {
    const reviewerCounts = this.db
      .select({
        pullRequestId: prReviewers.pullRequestId,
        reviewerCount: count().as('reviewer_count'),
      })
      .from(prReviewers)
      .groupBy(prReviewers.pullRequestId)
      .as('reviewer_counts')

    const [row] = await this.db
      .select({
        total: count(),
        open: sql<number>`count(*) filter (where ${pullRequests.status} = 'OPEN')`.mapWith(Number),
        merged: sql<number>`count(*) filter (where ${pullRequests.status} = 'MERGED')`.mapWith(Number),
        avgReviewers: sql<number>`coalesce(avg(coalesce(${reviewerCounts.reviewerCount}, 0)), 0)`.mapWith(Number),
      })
      .from(pullRequests)
      .leftJoin(reviewerCounts, eq(reviewerCounts.pullRequestId, pullRequests.pullRequestId))

    return row ?? { total: 0, open: 0, merged: 0, avgReviewers: 0 }
  }

  async getUserAssignmentStats(): Promise<Map<string, UserAssignmentStats>> {
    const rows = await this.db
      .select({
        userId: prReviewers.userId,
        totalAssignments: count(),
        openPrs: sql<number>`count(*) filter (where ${pullRequests.status} = 'OPEN')`.mapWith(Number),
        mergedPrs: sql<number>`count(*) filter (where ${pullRequests.status} = 'MERGED')`.mapWith(Number),
      })
      .from(prReviewers)
      .innerJoin(pullRequests, eq(pullRequests.pullRequestId, prReviewers.pullRequestId))
      .groupBy(prReviewers.userId)

    const stats = new Map<string, UserAssignmentStats>()
    for (const row of rows) {
      stats.set(row.userId, { ...row, username: '' })
    }
    return stats
  }
}
