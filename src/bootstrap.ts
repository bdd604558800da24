import databaseConfig from './config/database.js'
import { openDatabase, type SqliteDatabase } from './config/sqlite.js'
import { getLogger } from './logging/logger.js'
import { createTodoRepository, createTodoService, type TodoService } from './todo/index.js'

const logger = getLogger('bootstrap')

export interface Services {
  database: SqliteDatabase
  todoService: TodoService
}

/**
 * Opens the todo database, makes sure the schema exists and wires the
 * repository into the service shared by every transport.
 */
export function bootstrap (filename: string = databaseConfig.file): Services {
  const database = openDatabase(filename, { busyTimeoutMs: databaseConfig.busyTimeoutMs })
  const repository = createTodoRepository(database)
  repository.ensureSchema()
  logger.info(`Todo database ready at ${filename}`)

  return { database, todoService: createTodoService(repository) }
}
