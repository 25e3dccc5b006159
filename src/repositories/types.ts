import type {
  PullRequest,
  PullRequestShort,
  PullRequestStats,
  Team,
  User,
  UserAssignmentStats,
} from '../domain/models.js'

/**
 * Contratos de persistencia que consume el core
 * Todas las operaciones pueden rechazar con un error opaco del store
 */
export interface UserRepository {
  /** Rechaza con NOT_FOUND si el usuario no existe */
  get(userId: string): Promise<User>
  getByTeam(teamName: string): Promise<User[]>
  getActiveExcludingTeams(teamNames: string[]): Promise<User[]>
  setIsActive(userId: string, isActive: boolean): Promise<void>
  /** Desactiva de forma atómica los miembros activos y retorna sus IDs */
  bulkDeactivateByTeam(teamName: string): Promise<string[]>
}

export interface TeamRepository {
  /** Crea el equipo y hace upsert de sus miembros */
  create(team: Team): Promise<void>
  get(teamName: string): Promise<Team>
  exists(teamName: string): Promise<boolean>
}

export interface PullRequestRepository {
  /** Rechaza con PR_EXISTS si el ID está tomado, NOT_FOUND si el autor no existe */
  create(pr: PullRequest): Promise<void>
  get(prId: string): Promise<PullRequest>
  exists(prId: string): Promise<boolean>
  /** Las parejas (PR, reviewer) ya existentes se ignoran */
  assignReviewers(prId: string, reviewerIds: string[]): Promise<void>
  getReviewers(prId: string): Promise<string[]>
  removeReviewer(prId: string, reviewerId: string): Promise<void>
  /** Quita y agrega en una sola transacción */
  reassignReviewer(prId: string, oldReviewerId: string, newReviewerId: string): Promise<void>
  getOpenByReviewer(userId: string): Promise<string[]>
  getByReviewer(userId: string): Promise<PullRequestShort[]>
  /** Idempotente: un PR ya mergeado se retorna sin cambios */
  merge(prId: string): Promise<PullRequest>
  getStats(): Promise<PullRequestStats>
  getUserAssignmentStats(): Promise<Map<string, UserAssignmentStats>>
}

export interface Repositories {
  users: UserRepository
  teams: TeamRepository
  pullRequests: PullRequestRepository
}

export interface TransactionManager {
  withinTransaction<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T>
}
