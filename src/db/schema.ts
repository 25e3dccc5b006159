import { pgTable, text, boolean, timestamp, primaryKey, index } from 'drizzle-orm/pg-core'

/**
 * Teams
 */
export const teams = pgTable('teams', {
  teamName: text('team_name').primaryKey(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
})

/**
 * Users
 * Cada usuario pertenece a exactamente un equipo
 */
export const users = pgTable(
  'users',
  {
    userId: text('user_id').primaryKey(),
    username: text('username').notNull(),
    teamName: text('team_name')
      .notNull()
      .references(() => teams.teamName, { onDelete: 'cascade' }),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    teamActiveIdx: index('idx_users_team_active').on(t.teamName, t.isActive),
  })
)

/**
 * Pull Requests
 */
export const pullRequests = pgTable(
  'pull_requests',
  {
    pullRequestId: text('pull_request_id').primaryKey(),
    pullRequestName: text('pull_request_name').notNull(),
    authorId: text('author_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    status: text('status', { enum: ['OPEN', 'MERGED'] }).notNull().default('OPEN'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    mergedAt: timestamp('merged_at'),
  },
  (t) => ({
    authorIdx: index('idx_pr_author_id').on(t.authorId),
    statusIdx: index('idx_pr_status').on(t.status),
  })
)

/**
 * Reviewer assignments
 * La PK compuesta garantiza unicidad por (PR, reviewer)
 */
export const prReviewers = pgTable(
  'pr_reviewers',
  {
    pullRequestId: text('pull_request_id')
      .notNull()
      .references(() => pullRequests.pullRequestId, { onDelete: 'cascade' }),
    userId: text('user_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    assignedAt: timestamp('assigned_at').defaultNow().notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.pullRequestId, t.userId] }),
    userIdx: index('idx_pr_reviewers_user_id').on(t.userId),
  })
)

export type UserRow = typeof users.$inferSelect
export type PullRequestRow = typeof pullRequests.$inferSelect
