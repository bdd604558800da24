import 'dotenv/config'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { bootstrap } from './bootstrap.js'
import { getLogger } from './logging/logger.js'
import { createMcpServer } from './mcp/mcp.server.js'

const logger = getLogger('mcp')

async function main () {
  const { database, todoService } = bootstrap()
  const server = createMcpServer(todoService)
  const transport = new StdioServerTransport()

  transport.onclose = () => database.close()
  await server.connect(transport)
  logger.info('Todo MCP server listening on stdio')
}

main().catch((err: unknown) => {
  logger.error('Failed to start MCP server', err)
  process.exit(1)
})
