import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { openDatabase, type SqliteDatabase } from './config/sqlite.js'
import { createTodoRepository, createTodoService, type TodoRepository, type TodoService } from './todo/index.js'

export interface TempDatabase {
  dir: string
  filename: string
  database: SqliteDatabase
  cleanup (): void
}

/**
 * A file-backed database in a fresh temporary directory, so every test gets
 * its own id sequence.
 */
export function createTempDatabase (): TempDatabase {
  const dir = mkdtempSync(join(tmpdir(), 'todo-api-'))
  const filename = join(dir, 'todos.db')
  const database = openDatabase(filename)
  return {
    dir,
    filename,
    database,
    cleanup () {
      database.close()
      rmSync(dir, { recursive: true, force: true })
    },
  }
}

export function createTestServices (database: SqliteDatabase): { repository: TodoRepository, todoService: TodoService } {
  const repository = createTodoRepository(database)
  repository.ensureSchema()
  return { repository, todoService: createTodoService(repository) }
}
