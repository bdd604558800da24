import type { HttpBindings } from '@hono/node-server'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import corsConfig, { type CorsOptions } from './config/cors.js'
import { handleError, handleNotFound } from './error/error.handler.js'
import { getLogger } from './logging/logger.js'
import mcpRoutes from './mcp/mcp.routes.js'
import todoRoutes, { type TodoService } from './todo/index.js'

export const API_VERSION = '1.0.0'

export type AppEnv = {
  // only present when served by @hono/node-server
  Bindings: Partial<HttpBindings>
  Variables: {
    todoService: TodoService
  }
}

export interface AppOptions {
  cors?: CorsOptions
}

const httpLogger = getLogger('http')

export function createApp (todoService: TodoService, options: AppOptions = {}) {
  const app = new Hono<AppEnv>()

  app.use(logger((message, ...rest) => httpLogger.info([message, ...rest].join(' '))))
  app.use('*', cors(options.cors ?? corsConfig))
  app.use('*', async (c, next) => {
    c.set('todoService', todoService)
    await next()
  })

  app.get('/', (c) => {
    return c.json({
      message: 'Welcome to the Todo API',
      version: API_VERSION,
      docs: '/docs',
    })
  })
  app.route('/todos', todoRoutes)
  app.route('/mcp', mcpRoutes)

  app.onError(handleError)
  app.notFound(handleNotFound)

  return app
}

export type App = ReturnType<typeof createApp>
