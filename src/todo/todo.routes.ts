import { Hono } from 'hono'
import type { AppEnv } from '../app.js'
import * as controller from './todo.controller.js'

const todoRoutes = new Hono<AppEnv>()

todoRoutes.get('/', controller.listTodosController)
todoRoutes.get('/:todo_id', controller.getTodoController)
todoRoutes.post('/', controller.createTodoController)
todoRoutes.put('/:todo_id', controller.updateTodoController)
todoRoutes.delete('/:todo_id', controller.deleteTodoController)

export default todoRoutes
