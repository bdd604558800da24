import type { Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { getLogger } from '../logging/logger.js'
import { AppError } from './app.error.js'

const logger = getLogger('error')

export function handleError (err: Error, c: Context): Response {
  if (err instanceof AppError && err.status !== 500) {
    return c.json({ detail: err.detail }, err.status)
  }
  if (err instanceof HTTPException) {
    return err.getResponse()
  }

  logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err)
  return c.json({ detail: 'Internal Server Error' }, 500)
}

export function handleNotFound (c: Context): Response {
  return c.json({ detail: 'Not Found' }, 404)
}
