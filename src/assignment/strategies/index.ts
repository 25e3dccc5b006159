import type { CandidatePoolStrategy } from '../candidates.js'
import { AuthorTeamStrategy } from './author-team.js'
import { OtherTeamsStrategy } from './other-teams.js'
import { ReviewerTeamStrategy } from './reviewer-team.js'

/**
 * Orden de búsqueda: equipo del reviewer -> equipo del autor -> resto
 */
export function defaultCandidateStrategies(): CandidatePoolStrategy[] {
  return [new ReviewerTeamStrategy(), new AuthorTeamStrategy(), new OtherTeamsStrategy()]
}

export { AuthorTeamStrategy, OtherTeamsStrategy, ReviewerTeamStrategy }
