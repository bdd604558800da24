import type { cors } from 'hono/cors'

export type CorsOptions = NonNullable<Parameters<typeof cors>[0]>

/**
 * `*` in the list opens the API (REST and `/mcp`) to any origin; otherwise
 * only listed origins are echoed back. Browser MCP clients send
 * `Mcp-Protocol-Version`, so preflights must allow it.
 */
export function corsOptions (allowedOrigins: string[]): CorsOptions {
  const anyOrigin = allowedOrigins.includes('*')
  return {
    origin: anyOrigin ? '*' : (origin: string) => allowedOrigins.includes(origin) ? origin : null,
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'Mcp-Protocol-Version'],
    maxAge: 600,
  }
}

const envOrigins = process.env.CORS_ORIGINS || ''

export default corsOptions(envOrigins.split(',').map(o => o.trim()).filter(Boolean))
