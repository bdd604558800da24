import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import { Hono } from 'hono'
import type { AppEnv } from '../app.js'
import { getLogger } from '../logging/logger.js'
import { readJsonBody } from '../utils/request.js'
import { createMcpServer } from './mcp.server.js'

const logger = getLogger('mcp')

const mcpRoutes = new Hono<AppEnv>()

// Stateless: every request gets its own server and transport, both bound to
// the shared todo service.
mcpRoutes.all('/', async (c) => {
  const incoming = c.env?.incoming
  const outgoing = c.env?.outgoing
  if (!incoming || !outgoing) {
    return c.json({ detail: 'MCP over HTTP is only available on the Node.js server' }, 501)
  }

  // the transport writes to `outgoing` itself, so headers set by earlier
  // middleware (CORS) have to be carried over by hand
  c.res.headers.forEach((value, key) => {
    if (key.startsWith('access-control-') || key === 'vary') outgoing.setHeader(key, value)
  })

  const server = createMcpServer(c.get('todoService'))
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined,
    enableJsonResponse: true,
  })
  outgoing.on('close', () => {
    Promise.all([transport.close(), server.close()]).catch((err: unknown) => {
      logger.error('Failed to close MCP transport: %s', err instanceof Error ? err.message : String(err))
    })
  })

  const body = c.req.method === 'POST' ? await readJsonBody(c) : undefined
  await server.connect(transport)
  await transport.handleRequest(incoming, outgoing, body)
  return RESPONSE_ALREADY_SENT
})

export default mcpRoutes
