import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { registerTodoTools, type TodoService } from '../todo/index.js'

export const MCP_SERVER_INFO = {
  name: 'todo-api',
  version: '1.0.0',
}

export function createMcpServer (service: TodoService): McpServer {
  const server = new McpServer(MCP_SERVER_INFO)
  registerTodoTools(server, service)
  return server
}
