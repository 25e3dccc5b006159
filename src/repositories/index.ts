import type { Database } from '../db/client.js'
import { DrizzlePullRequestRepository } from './pull-requests.js'
import { DrizzleTeamRepository } from './teams.js'
import type { Repositories, TransactionManager } from './types.js'
import { DrizzleUserRepository } from './users.js'

export function createRepositories(db: Database): Repositories {
  return {
    users: new DrizzleUserRepository(db),
    teams: new DrizzleTeamRepository(db),
    pullRequests: new DrizzlePullRequestRepository(db),
  }
}

/**
 * Ejecuta una unidad de trabajo con repositorios ligados a una transacción
 * Si `fn` rechaza, Drizzle hace rollback de todo
 */
export class DrizzleTransactionManager implements TransactionManager {
  constructor(private readonly db: Database) {}

  withinTransaction<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T> {
    return this.db.transaction(tx => fn(createRepositories(tx)))
  }
}

export type { Repositories, TransactionManager } from './types.js'
