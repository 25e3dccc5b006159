import type { DeactivationEngine } from '../assignment/deactivation.js'
import type { AssignmentEngine } from '../assignment/engine.js'
import type { StatsService } from '../services/stats.js'
import type { TeamService } from '../services/team.js'

export interface AppServices {
  assignment: AssignmentEngine
  deactivation: DeactivationEngine
  teams: TeamService
  stats: StatsService
  /** null cuando no hay base de datos configurada */
  healthCheck?: () => Promise<boolean | null>
}
