import type { Connection, SqliteDatabase } from '../config/sqlite.js'
import type { Todo, TodoPatch } from './todo.schema.js'

const TABLE = 'todos'

interface TodoRow {
  todo_id: number
  content: string
  completed: number
}

export interface TodoRepository {
  ensureSchema (): void
  getAllTodos (): Todo[]
  getTodoById (id: number): Todo | undefined
  insertTodo (content: string, completed: boolean): number
  updateTodo (id: number, patch: TodoPatch): boolean
  deleteTodo (id: number): boolean
}

function rowToTodo (row: TodoRow): Todo {
  return {
    todo_id: row.todo_id,
    content: row.content,
    completed: Boolean(row.completed),
  }
}

function findRow (conn: Connection, id: number): TodoRow | undefined {
  return conn.prepare<[number], TodoRow>(`SELECT todo_id, content, completed FROM ${TABLE} WHERE todo_id = ?`).get(id)
}

export function createTodoRepository (database: SqliteDatabase): TodoRepository {
  return {
    ensureSchema () {
      database.withConnection(conn => {
        conn.exec(`
          CREATE TABLE IF NOT EXISTS ${TABLE} (
            todo_id INTEGER PRIMARY KEY AUTOINCREMENT,
            content TEXT NOT NULL,
            completed BOOLEAN NOT NULL DEFAULT 0
          )
        `)
      })
    },

    getAllTodos () {
      return database.withConnection(conn =>
        conn.prepare<[], TodoRow>(`SELECT todo_id, content, completed FROM ${TABLE} ORDER BY todo_id`)
          .all()
          .map(rowToTodo)
      )
    },

    getTodoById (id) {
      return database.withConnection(conn => {
        const row = findRow(conn, id)
        return row ? rowToTodo(row) : undefined
      })
    },

    insertTodo (content, completed) {
      return database.withConnection(conn => {
        const result = conn.prepare(`INSERT INTO ${TABLE} (content, completed) VALUES (?, ?)`)
          .run(content, completed ? 1 : 0)
        return Number(result.lastInsertRowid)
      })
    },

    updateTodo (id, patch) {
      const sets: string[] = []
      const params: (string | number)[] = []
      if (patch.content !== undefined) {
        sets.push('content = ?')
        params.push(patch.content)
      }
      if (patch.completed !== undefined) {
        sets.push('completed = ?')
        params.push(patch.completed ? 1 : 0)
      }

      return database.withConnection(conn => {
        if (sets.length === 0) return findRow(conn, id) !== undefined
        const result = conn.prepare(`UPDATE ${TABLE} SET ${sets.join(', ')} WHERE todo_id = ?`)
          .run(...params, id)
        return result.changes > 0
      })
    },

    deleteTodo (id) {
      return database.withConnection(conn =>
        conn.prepare(`DELETE FROM ${TABLE} WHERE todo_id = ?`).run(id).changes > 0
      )
    },
  }
}
