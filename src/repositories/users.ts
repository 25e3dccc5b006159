import { and, asc, eq, notInArray } from 'drizzle-orm'
import type { Database } from '../db/client.js'
import { users, type UserRow } from '../db/schema.js'
import { errors } from '../domain/errors.js'
import type { User } from '../domain/models.js'
import type { UserRepository } from './types.js'

export function toUser(row: UserRow): User {
  return {
    userId: row.userId,
    username: row.username,
    teamName: row.teamName,
    isActive: row.isActive,
  }
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async get(userId: string): Promise<User> {
    const [row] = await this.db
      .select()
      .from(users)
      .where(eq(users.userId, userId))
      .limit(1)

    if (!row) {
      throw errors.notFound(`user ${userId} not found`)
    }

    return toUser(row)
  }

  async getByTeam(teamName: string): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(users)
      .where(eq(users.teamName, teamName))
      .orderBy(asc(users.userId))

    return rows.map(toUser)
  }

  async getActiveExcludingTeams(teamNames: string[]): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(users)
      .where(
        and(
          eq(users.isActive, true),
          teamNames.length > 0 ? notInArray(users.teamName, teamNames) : undefined
        )
      )
      .orderBy(asc(users.userId))

    return rows.map(toUser)
  }

  async setIsActive(userId: string, isActive: boolean): Promise<void> {
    const updated = await this.db
      .update(users)
      .set({ isActive, updatedAt: new Date() })
      .where(eq(users.userId, userId))
      .returning({ userId: users.userId })

    if (updated.length === 0) {
      throw errors.notFound(`user ${userId} not found`)
    }
  }

  async bulkDeactivateByTeam(teamName: string): Promise<string[]> {
    // Un solo UPDATE: el flip es atómico para todo el equipo
    const updated = await this.db
      .update(users)
      .set({ isActive: false, updatedAt: new Date() })
      .where(and(eq(users.teamName, teamName), eq(users.isActive, true)))
      .returning({ userId: users.userId })

    return updated.map(row => row.userId)
  }
}
