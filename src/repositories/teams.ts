import { asc, eq } from 'drizzle-orm'
import type { Database } from '../db/client.js'
import { teams, users } from '../db/schema.js'
import { errors } from '../domain/errors.js'
import type { Team } from '../domain/models.js'
import { getPgErrorCode, PG_UNIQUE_VIOLATION } from './pg-errors.js'
import type { TeamRepository } from './types.js'

export class DrizzleTeamRepository implements TeamRepository {
  constructor(private readonly db: Database) {}

  async create(team: Team): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        await tx.insert(teams).values({ teamName: team.teamName })

        for (const member of team.members) {
          // Un usuario existente se mueve al nuevo equipo
          await tx
            .insert(users)
            .values({
              userId: member.userId,
              username: member.username,
              teamName: team.teamName,
              isActive: member.isActive,
            })
            .onConflictDoUpdate({
              target: users.userId,
              set: {
                username: member.username,
                teamName: team.teamName,
                isActive: member.isActive,
                updatedAt: new Date(),
              },
            })
        }
      })
    } catch (error) {
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw errors.teamExists()
      }
      throw error
    }
  }

  async get(teamName: string): Promise<Team> {
    if (!(await this.exists(teamName))) {
      throw errors.notFound(`team ${teamName} not found`)
    }

    const members = await this.db
      .select({
        userId: users.userId,
        username: users.username,
        isActive: users.isActive,
      })
      .from(users)
      .where(eq(users.teamName, teamName))
      .orderBy(asc(users.userId))

    return { teamName, members }
  }

  async exists(teamName: string): Promise<boolean> {
    const rows = await this.db
      .select({ teamName: teams.teamName })
      .from(teams)
      .where(eq(teams.teamName, teamName))
      .limit(1)

    return rows.length > 0
  }
}
