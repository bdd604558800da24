import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import { z } from 'zod'
import { AppError } from '../error/app.error.js'
import {
  CreateTodoSchema,
  TodoIdSchema,
  UpdateTodoSchema,
  parseInput,
  toTodoPatch,
} from './todo.schema.js'
import type { TodoService } from './todo.service.js'

export const TODO_TOOL_NAMES = ['get_all_todos', 'get_todo', 'create_todo', 'update_todo', 'delete_todo'] as const

function textResult (value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] }
}

/**
 * Client-side failures become tool errors the agent can read and react to;
 * anything else is left for the SDK to report as an internal error.
 */
function run (operation: () => CallToolResult): CallToolResult {
  try {
    return operation()
  } catch (err) {
    if (err instanceof AppError && err.status !== 500) {
      const text = typeof err.detail === 'string' ? err.detail : JSON.stringify(err.detail)
      return { isError: true, content: [{ type: 'text', text }] }
    }
    throw err
  }
}

// Arguments are advertised unconstrained; parseInput checks them and reports
// the same issues as the HTTP routes.
const argument = (description: string) => z.unknown().describe(description)

const todoIdArgument = argument('The unique identifier of the todo item (integer)')

const toolArguments = {
  content: argument('The todo item content (non-empty string)'),
  completed: argument('Whether the todo is completed (boolean)'),
}

function parseToolId (raw: unknown): number {
  return parseInput(TodoIdSchema, raw, 'tool', ['todo_id'])
}

export function registerTodoTools (server: McpServer, service: TodoService): void {
  server.tool(
    'get_all_todos',
    'Retrieve a list of all todo items from the database',
    () => run(() => textResult(service.listTodos()))
  )

  server.tool(
    'get_todo',
    'Retrieve a single todo item by its ID',
    { todo_id: todoIdArgument },
    ({ todo_id }) => run(() => textResult(service.getTodo(parseToolId(todo_id))))
  )

  server.tool(
    'create_todo',
    'Create a new todo item in the database',
    toolArguments,
    (args) => run(() => textResult(service.addTodo(parseInput(CreateTodoSchema, args, 'tool'))))
  )

  server.tool(
    'update_todo',
    'Update an existing todo item by its ID (supports partial updates)',
    { todo_id: todoIdArgument, ...toolArguments },
    ({ todo_id, ...fields }) => run(() => {
      const id = parseToolId(todo_id)
      const patch = toTodoPatch(parseInput(UpdateTodoSchema, fields, 'tool'))
      return textResult(service.editTodo(id, patch))
    })
  )

  server.tool(
    'delete_todo',
    'Delete a todo item from the database by its ID',
    { todo_id: todoIdArgument },
    ({ todo_id }) => run(() => {
      service.removeTodo(parseToolId(todo_id))
      return { content: [] }
    })
  )
}
