/**
 * Application error classes.
 * Each one carries the HTTP status it maps to, so transports can translate
 * them without knowing the concrete type.
 */

export type ErrorStatus = 404 | 422 | 500

/**
 * One failed field check, shaped like the `detail` items clients already
 * expect from a 422 response.
 */
export type ValidationIssue = {
  loc: (string | number)[]
  msg: string
  type: string
}

/**
 * Base application error class
 */
export class AppError extends Error {
  code: string
  status: ErrorStatus

  constructor (message: string, code = 'APP_ERROR', status: ErrorStatus = 500) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.status = status
    Error.captureStackTrace(this, this.constructor)
  }

  /**
   * Body sent to clients under `detail`
   */
  get detail (): string | ValidationIssue[] {
    return this.message
  }
}

/**
 * Malformed or missing input, raised before storage is touched
 */
export class ValidationError extends AppError {
  issues: ValidationIssue[]

  constructor (issues: ValidationIssue[]) {
    super(issues.map(issue => `${issue.loc.join('.')}: ${issue.msg}`).join('; '), 'VALIDATION_ERROR', 422)
    this.issues = issues
  }

  override get detail (): ValidationIssue[] {
    return this.issues
  }
}

export class NotFoundError extends AppError {
  todoId: number

  constructor (todoId: number) {
    super(`Todo with id ${todoId} not found`, 'NOT_FOUND', 404)
    this.todoId = todoId
  }
}

/**
 * Database-related errors
 */
export class DatabaseError extends AppError {
  constructor (message: string, code = 'DATABASE_ERROR') {
    super(message, code, 500)
  }
}

export class ConfigError extends AppError {
  constructor (message: string, code = 'CONFIG_ERROR') {
    super(message, code, 500)
  }
}
