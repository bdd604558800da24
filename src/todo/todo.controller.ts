import type { Context } from 'hono'
import type { AppEnv } from '../app.js'
import { readJsonBody } from '../utils/request.js'
import { parseCreateInput, parseTodoId, parseTodoPatch } from './todo.schema.js'

export function listTodosController (c: Context<AppEnv>) {
  const todos = c.get('todoService').listTodos()
  return c.json(todos)
}

export function getTodoController (c: Context<AppEnv>) {
  const id = parseTodoId(c.req.param('todo_id'))
  const todo = c.get('todoService').getTodo(id)
  return c.json(todo)
}

export async function createTodoController (c: Context<AppEnv>) {
  const input = parseCreateInput(await readJsonBody(c))
  const todo = c.get('todoService').addTodo(input)
  return c.json(todo, 201)
}

export async function updateTodoController (c: Context<AppEnv>) {
  const id = parseTodoId(c.req.param('todo_id'))
  const patch = parseTodoPatch(await readJsonBody(c))
  const todo = c.get('todoService').editTodo(id, patch)
  return c.json(todo)
}

export function deleteTodoController (c: Context<AppEnv>) {
  const id = parseTodoId(c.req.param('todo_id'))
  c.get('todoService').removeTodo(id)
  return c.body(null, 204)
}
