import { z } from 'zod'
import { logger } from '../utils/logger.js'

const GlobalConfigSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().positive().default(3000),
  }),
  database: z.object({
    url: z.string().optional(), // PostgreSQL connection string
    enabled: z.boolean().default(false),
    pool_size: z.coerce.number().int().positive().default(10),
  }),
  assignment: z.object({
    reviewers_per_pr: z.coerce.number().int().positive().default(2),
  }),
  log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>

let globalConfig: GlobalConfig | null = null

export function loadGlobalConfig(): GlobalConfig {
  if (globalConfig) {
    return globalConfig
  }

  try {
    const rawConfig = {
      server: {
        host: process.env.HOST || undefined,
        port: process.env.PORT || undefined,
      },
      database: {
        url: process.env.DATABASE_URL || undefined,
        enabled: !!process.env.DATABASE_URL, // Solo habilitar si hay connection string
        pool_size: process.env.DB_POOL_MAX || undefined,
      },
      assignment: {
        reviewers_per_pr: process.env.REVIEWERS_PER_PR || undefined,
      },
      log_level: process.env.LOG_LEVEL || undefined,
    }

    globalConfig = GlobalConfigSchema.parse(rawConfig)
    logger.info('Global config loaded')

    return globalConfig
  } catch (error) {
    logger.error({ error }, 'Failed to load global config')
    throw error
  }
}
