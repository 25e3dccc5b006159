import type { Repositories, TransactionManager } from '../repositories/types.js'
import type { CandidatePoolStrategy } from './candidates.js'
import { DeactivationEngine } from './deactivation.js'
import { AssignmentEngine } from './engine.js'
import type { RandomSource } from './random.js'
import { defaultCandidateStrategies } from './strategies/index.js'

export interface EngineOptions {
  random?: RandomSource
  strategies?: CandidatePoolStrategy[]
  reviewersPerPr?: number
}

export interface Engines {
  assignment: AssignmentEngine
  deactivation: DeactivationEngine
}

export function createEngines(
  repositories: Repositories,
  transactions: TransactionManager,
  options: EngineOptions = {}
): Engines {
  const strategies = options.strategies ?? defaultCandidateStrategies()

  return {
    assignment: new AssignmentEngine({
      repositories,
      transactions,
      random: options.random,
      strategies,
      reviewersPerPr: options.reviewersPerPr,
    }),
    deactivation: new DeactivationEngine({
      repositories,
      random: options.random,
      strategies,
    }),
  }
}
