import type { User } from '../../domain/models.js'
import { logger } from '../../utils/logger.js'
import type { CandidatePoolStrategy, CandidateSearchContext } from '../candidates.js'

/**
 * Tier 3: usuarios activos de cualquier equipo aún no recorrido
 */
export class OtherTeamsStrategy implements CandidatePoolStrategy {
  readonly tier = 'other-teams' as const

  async pool(context: CandidateSearchContext): Promise<User[] | null> {
    const excludeTeams = [...context.searchedTeams]

    logger.info({
      prId: context.pr.pullRequestId,
      excludeTeams,
    }, 'No candidates in searched teams, searching in other teams')

    return context.users.getActiveExcludingTeams(excludeTeams)
  }
}
