import type { Context } from 'hono'
import { ValidationError } from '../error/app.error.js'

/**
 * Reads the request body as JSON. A missing or unparsable body is a
 * validation failure, not a server fault.
 */
export async function readJsonBody (c: Context): Promise<unknown> {
  const text = await c.req.text()
  if (text.trim() === '') {
    throw new ValidationError([{ loc: ['body'], msg: 'Field required', type: 'missing' }])
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    const msg = err instanceof Error ? err.message : 'Invalid JSON'
    throw new ValidationError([{ loc: ['body'], msg: `JSON decode error: ${msg}`, type: 'json_invalid' }])
  }
}
