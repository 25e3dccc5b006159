import type { User } from '../../domain/models.js'
import { logger } from '../../utils/logger.js'
import type { CandidatePoolStrategy, CandidateSearchContext } from '../candidates.js'

/**
 * Tier 2: miembros del equipo del autor del PR
 * Solo aplica si ese equipo no fue recorrido antes
 */
export class AuthorTeamStrategy implements CandidatePoolStrategy {
  readonly tier = 'author-team' as const

  async pool(context: CandidateSearchContext): Promise<User[] | null> {
    const author = await context.getAuthor()

    if (context.searchedTeams.has(author.teamName)) {
      return null
    }

    logger.info({
      prId: context.pr.pullRequestId,
      reviewerTeam: context.replacedReviewer.teamName,
      authorTeam: author.teamName,
    }, 'No candidates in reviewer team, searching in author team')

    context.searchedTeams.add(author.teamName)
    return context.users.getByTeam(author.teamName)
  }
}
