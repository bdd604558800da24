import { NotFoundError } from '../error/app.error.js'
import type { TodoRepository } from './todo.repository.js'
import type { CreateTodoInput, Todo, TodoPatch } from './todo.schema.js'

export interface TodoService {
  listTodos (): Todo[]
  getTodo (id: number): Todo
  addTodo (data: CreateTodoInput): Todo
  editTodo (id: number, patch: TodoPatch): Todo
  removeTodo (id: number): void
}

export function createTodoService (repo: TodoRepository): TodoService {
  function getTodo (id: number): Todo {
    const todo = repo.getTodoById(id)
    if (!todo) throw new NotFoundError(id)
    return todo
  }

  return {
    listTodos () {
      return repo.getAllTodos()
    },

    getTodo,

    addTodo (data) {
      const id = repo.insertTodo(data.content, data.completed)
      return getTodo(id)
    },

    editTodo (id, patch) {
      if (!repo.updateTodo(id, patch)) throw new NotFoundError(id)
      return getTodo(id)
    },

    removeTodo (id) {
      if (!repo.deleteTodo(id)) throw new NotFoundError(id)
    },
  }
}
