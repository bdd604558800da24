import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { AppError, DatabaseError } from '../error/app.error.js'
import { getLogger } from '../logging/logger.js'

const logger = getLogger('sqlite')

export type Connection = Database.Database

export interface SqliteDatabase {
  readonly filename: string
  /**
   * Runs `work` in a single transaction on its own connection. The
   * transaction commits when `work` returns and rolls back when it throws;
   * the connection is closed either way.
   */
  withConnection<T> (work: (conn: Connection) => T): T
  close (): void
}

export interface SqliteOptions {
  busyTimeoutMs?: number
}

const MEMORY = ':memory:'

export function openDatabase (filename: string, options: SqliteOptions = {}): SqliteDatabase {
  const timeout = options.busyTimeoutMs ?? 5000

  // an in-memory database only lives as long as its connection
  let shared: Connection | null = null
  if (filename === MEMORY) {
    shared = connect(filename, timeout)
  } else {
    mkdirSync(dirname(filename), { recursive: true })
  }

  return {
    filename,

    withConnection<T> (work: (conn: Connection) => T): T {
      const conn = shared ?? connect(filename, timeout)
      try {
        return conn.transaction(work)(conn)
      } catch (err) {
        if (err instanceof AppError) throw err
        logger.error('Transaction failed on %s: %s', filename, errorMessage(err))
        throw new DatabaseError(`Database operation failed: ${errorMessage(err)}`)
      } finally {
        if (conn !== shared) conn.close()
      }
    },

    close () {
      if (shared) {
        shared.close()
        shared = null
        logger.info('Database connection closed')
      }
    },
  }
}

function connect (filename: string, timeout: number): Connection {
  try {
    return new Database(filename, { timeout })
  } catch (err) {
    throw new DatabaseError(`Failed to open database ${filename}: ${errorMessage(err)}`)
  }
}

function errorMessage (err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
