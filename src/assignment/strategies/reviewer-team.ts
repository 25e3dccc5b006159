import type { User } from '../../domain/models.js'
import type { CandidatePoolStrategy, CandidateSearchContext } from '../candidates.js'

/**
 * Tier 1: miembros del equipo del reviewer reemplazado
 */
export class ReviewerTeamStrategy implements CandidatePoolStrategy {
  readonly tier = 'reviewer-team' as const

  async pool(context: CandidateSearchContext): Promise<User[] | null> {
    const teamName = context.replacedReviewer.teamName
    context.searchedTeams.add(teamName)
    return context.users.getByTeam(teamName)
  }
}
