import Fastify from 'fastify'
import { createEngines } from './assignment/index.js'
import { loadGlobalConfig, type GlobalConfig } from './config/global.js'
import { closeDatabase, getDatabase, healthCheck, initDatabase } from './db/client.js'
import { handleGetReview, handleSetIsActive } from './http/handlers/user.js'
import {
  handleCreatePullRequest,
  handleMergePullRequest,
  handleReassignReviewer,
} from './http/handlers/pull-request.js'
import { handleGetStats } from './http/handlers/stats.js'
import { handleCreateTeam, handleDeactivateTeam, handleGetTeam } from './http/handlers/team.js'
import type { AppServices } from './http/types.js'
import { createRepositories, DrizzleTransactionManager } from './repositories/index.js'
import { StatsService } from './services/stats.js'
import { TeamService } from './services/team.js'
import { logger } from './utils/logger.js'

export interface CreateServerOptions {
  config?: GlobalConfig
  /** Servicios ya construidos (tests); si falta, se cablean contra Postgres */
  services?: AppServices
}

/**
 * Construye los servicios sobre los repositorios Drizzle
 */
export function createDatabaseServices(config: GlobalConfig): AppServices {
  if (!config.database.enabled || !config.database.url) {
    throw new Error('DATABASE_URL is not configured')
  }

  initDatabase(config.database.url, config.database.pool_size)
  const db = getDatabase()
  const repositories = createRepositories(db)
  const engines = createEngines(repositories, new DrizzleTransactionManager(db), {
    reviewersPerPr: config.assignment.reviewers_per_pr,
  })

  logger.info('Database enabled and initialized')

  return {
    ...engines,
    teams: new TeamService(repositories),
    stats: new StatsService(repositories),
    healthCheck,
  }
}

export async function createServer(options: CreateServerOptions = {}) {
  const config = options.config ?? loadGlobalConfig()

  const server = Fastify({
    logger: {
      level: config.log_level,
    },
  })

  const ownsDatabase = !options.services
  const services = options.services ?? createDatabaseServices(config)

  if (ownsDatabase) {
    server.addHook('onClose', async () => {
      await closeDatabase()
    })
  }

  // Health check
  server.get('/health', async () => {
    let dbHealthy: boolean | null = null

    if (services.healthCheck) {
      try {
        dbHealthy = await services.healthCheck()
      } catch (error) {
        logger.error({ error }, 'Database health check failed')
        dbHealthy = false
      }
    }

    return {
      status: 'ok',
      database: dbHealthy === null
        ? 'disabled'
        : dbHealthy
          ? 'connected'
          : 'disconnected',
    }
  })

  // Teams
  server.post('/team/add', async (request, reply) => handleCreateTeam(request, reply, services))
  server.get('/team/get', async (request, reply) => handleGetTeam(request, reply, services))
  server.post('/team/deactivate', async (request, reply) => handleDeactivateTeam(request, reply, services))

  // Users
  server.post('/users/setIsActive', async (request, reply) => handleSetIsActive(request, reply, services))
  server.get('/users/getReview', async (request, reply) => handleGetReview(request, reply, services))

  // Pull Requests
  server.post('/pullRequest/create', async (request, reply) => handleCreatePullRequest(request, reply, services))
  server.post('/pullRequest/merge', async (request, reply) => handleMergePullRequest(request, reply, services))
  server.post('/pullRequest/reassign', async (request, reply) => handleReassignReviewer(request, reply, services))

  // Stats
  server.get('/stats', async (request, reply) => handleGetStats(request, reply, services))

  return server
}
