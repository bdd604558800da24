import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createApp } from './app.js'
import { bootstrap } from './bootstrap.js'
import serverConfig from './config/server.js'
import { getLogger } from './logging/logger.js'

const logger = getLogger('server')

const { database, todoService } = bootstrap()
const app = createApp(todoService)

const server = serve({ fetch: app.fetch, port: serverConfig.port })
logger.info(`Server running at http://localhost:${serverConfig.port}`)

// graceful shutdown
function shutdown (signal: string) {
  logger.info(`${signal} received, shutting down gracefully...`)
  server.close((err) => {
    database.close()
    if (err) {
      logger.error('Error while closing the server', err)
      process.exit(1)
    }
    process.exit(0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
