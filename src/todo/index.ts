export { default } from './todo.routes.js'
export { createTodoRepository, type TodoRepository } from './todo.repository.js'
export { createTodoService, type TodoService } from './todo.service.js'
export { registerTodoTools, TODO_TOOL_NAMES } from './todo.tools.js'
export type { CreateTodoInput, Todo, TodoPatch } from './todo.schema.js'
