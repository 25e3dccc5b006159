import { errors } from '../domain/errors.js'
import type { Team } from '../domain/models.js'
import type { Repositories } from '../repositories/types.js'
import { logger } from '../utils/logger.js'

export class TeamService {
  constructor(private readonly repositories: Repositories) {}

  /**
   * Crea el equipo y agrega/actualiza sus miembros de forma atómica
   * Un usuario que ya existía pasa a pertenecer a este equipo
   */
  async createTeam(team: Team): Promise<Team> {
    const { teams } = this.repositories

    if (await teams.exists(team.teamName)) {
      throw errors.teamExists()
    }

    await teams.create(team)

    logger.info({ teamName: team.teamName, members: team.members.length }, 'Team created')

    return teams.get(team.teamName)
  }

  async getTeam(teamName: string): Promise<Team> {
    return this.repositories.teams.get(teamName)
  }
}
