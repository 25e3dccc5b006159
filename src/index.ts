import 'dotenv/config'
import { loadGlobalConfig } from './config/global.js'
import { createServer } from './server.js'
import { logger } from './utils/logger.js'

async function main() {
  try {
    const config = loadGlobalConfig()
    const server = await createServer({ config })

    await server.listen({ port: config.server.port, host: config.server.host })

    logger.info({ port: config.server.port }, 'Server started')

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        logger.info({ signal }, 'Shutting down')
        server.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error({ error }, 'Failed to close server')
            process.exit(1)
          }
        )
      })
    }
  } catch (error) {
    logger.error({ error }, 'Failed to start server')
    process.exit(1)
  }
}

main()
