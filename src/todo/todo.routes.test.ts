import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createApp, type App } from '../app.js'
import { corsOptions } from '../config/cors.js'
import { createTempDatabase, createTestServices, type TempDatabase } from '../testing.js'
import type { TodoService } from './todo.service.js'

function jsonRequest (method: string, body: unknown): RequestInit {
  return {
    method,
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json' },
  }
}

describe('todo routes', () => {
  let temp: TempDatabase
  let app: App

  beforeEach(() => {
    temp = createTempDatabase()
    app = createApp(createTestServices(temp.database).todoService)
  })

  afterEach(() => {
    temp.cleanup()
  })

  it('GET / returns the service banner', async () => {
    const res = await app.request('/')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ message: 'Welcome to the Todo API', version: '1.0.0', docs: '/docs' })
  })

  it('runs the create, update, delete lifecycle', async () => {
    const created = await app.request('/todos', jsonRequest('POST', { content: 'buy milk', completed: false }))
    expect(created.status).toBe(201)
    expect(await created.json()).toEqual({ todo_id: 1, content: 'buy milk', completed: false })

    const updated = await app.request('/todos/1', jsonRequest('PUT', { completed: true }))
    expect(updated.status).toBe(200)
    expect(await updated.json()).toEqual({ todo_id: 1, content: 'buy milk', completed: true })

    const deleted = await app.request('/todos/1', { method: 'DELETE' })
    expect(deleted.status).toBe(204)
    expect(await deleted.text()).toBe('')

    const missing = await app.request('/todos/1')
    expect(missing.status).toBe(404)
    expect(await missing.json()).toEqual({ detail: 'Todo with id 1 not found' })
  })

  it('GET /todos lists todos in creation order', async () => {
    await app.request('/todos', jsonRequest('POST', { content: 'first' }))
    await app.request('/todos', jsonRequest('POST', { content: 'second', completed: true }))

    const res = await app.request('/todos')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual([
      { todo_id: 1, content: 'first', completed: false },
      { todo_id: 2, content: 'second', completed: true },
    ])
  })

  it('GET /todos returns an empty array when there are none', async () => {
    const res = await app.request('/todos')
    expect(await res.json()).toEqual([])
  })

  it('PUT keeps content when it is null or left out', async () => {
    await app.request('/todos', jsonRequest('POST', { content: 'walk the dog' }))

    const res = await app.request('/todos/1', jsonRequest('PUT', { content: null, completed: true }))
    expect(await res.json()).toEqual({ todo_id: 1, content: 'walk the dog', completed: true })
  })

  it('returns 404 for update and delete of unknown ids', async () => {
    const put = await app.request('/todos/42', jsonRequest('PUT', { completed: true }))
    expect(put.status).toBe(404)
    expect(await put.json()).toEqual({ detail: 'Todo with id 42 not found' })

    const del = await app.request('/todos/42', { method: 'DELETE' })
    expect(del.status).toBe(404)
    expect(await del.json()).toEqual({ detail: 'Todo with id 42 not found' })
  })

  it('returns 422 when content is missing', async () => {
    const res = await app.request('/todos', jsonRequest('POST', { completed: true }))
    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      detail: [{ loc: ['body', 'content'], msg: 'Required', type: 'invalid_type' }],
    })
  })

  it('returns 422 for a body that is not JSON', async () => {
    const res = await app.request('/todos', {
      method: 'POST',
      body: '{"content": ',
      headers: { 'Content-Type': 'application/json' },
    })
    expect(res.status).toBe(422)
    expect(await res.json()).toMatchObject({ detail: [{ loc: ['body'], type: 'json_invalid' }] })
  })

  it('returns 422 for a non-integer id before touching storage', async () => {
    const res = await app.request('/todos/abc', jsonRequest('PUT', { completed: 'yes' }))
    expect(res.status).toBe(422)
    expect(await res.json()).toEqual({
      detail: [{ loc: ['path', 'todo_id'], msg: 'Input should be a valid integer', type: 'invalid_string' }],
    })
  })

  it('returns 422 for ids beyond the safe integer range instead of a rounded 404', async () => {
    for (const path of ['/todos/9007199254740993', '/todos/99999999999999999999999']) {
      const res = await app.request(path)
      expect(res.status).toBe(422)
      expect(await res.json()).toEqual({
        detail: [{ loc: ['path', 'todo_id'], msg: 'Input should be a safe integer', type: 'custom' }],
      })
    }
  })

  it('still looks up the largest safe id', async () => {
    const res = await app.request('/todos/9007199254740991')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ detail: 'Todo with id 9007199254740991 not found' })
  })

  it('does not reuse ids after a delete', async () => {
    await app.request('/todos', jsonRequest('POST', { content: 'one' }))
    await app.request('/todos/1', { method: 'DELETE' })

    const res = await app.request('/todos', jsonRequest('POST', { content: 'two' }))
    expect(await res.json()).toEqual({ todo_id: 2, content: 'two', completed: false })
  })

  it('answers unknown routes with a JSON 404', async () => {
    const res = await app.request('/nothing-here')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ detail: 'Not Found' })
  })

  it('reports MCP over HTTP as unavailable outside the Node.js server', async () => {
    const res = await app.request('/mcp', jsonRequest('POST', { jsonrpc: '2.0', id: 1, method: 'ping' }))
    expect(res.status).toBe(501)
  })
})

describe('todo routes with CORS', () => {
  let temp: TempDatabase

  beforeEach(() => {
    temp = createTempDatabase()
  })

  afterEach(() => {
    temp.cleanup()
  })

  it('allows any origin when the list contains *', async () => {
    const app = createApp(createTestServices(temp.database).todoService, { cors: corsOptions(['*']) })
    const res = await app.request('/todos', { headers: { Origin: 'https://planner.test' } })
    expect(res.headers.get('access-control-allow-origin')).toBe('*')
  })

  it('echoes listed origins and ignores the rest', async () => {
    const app = createApp(createTestServices(temp.database).todoService, { cors: corsOptions(['https://planner.test']) })

    const listed = await app.request('/todos', { headers: { Origin: 'https://planner.test' } })
    expect(listed.headers.get('access-control-allow-origin')).toBe('https://planner.test')

    const other = await app.request('/todos', { headers: { Origin: 'https://elsewhere.test' } })
    expect(other.headers.get('access-control-allow-origin')).toBeNull()
  })

  it('lets preflights send the MCP protocol header', async () => {
    const app = createApp(createTestServices(temp.database).todoService, { cors: corsOptions(['*']) })
    const res = await app.request('/mcp', {
      method: 'OPTIONS',
      headers: {
        Origin: 'https://planner.test',
        'Access-Control-Request-Method': 'POST',
        'Access-Control-Request-Headers': 'content-type, mcp-protocol-version',
      },
    })
    expect(res.status).toBe(204)
    expect(res.headers.get('access-control-allow-headers')).toBe('Content-Type,Authorization,Mcp-Protocol-Version')
  })
})

describe('todo routes on storage faults', () => {
  it('hides the failure behind a generic 500', async () => {
    const failing: TodoService = {
      listTodos () { throw new Error('disk I/O error') },
      getTodo () { throw new Error('disk I/O error') },
      addTodo () { throw new Error('disk I/O error') },
      editTodo () { throw new Error('disk I/O error') },
      removeTodo () { throw new Error('disk I/O error') },
    }
    const app = createApp(failing)

    const res = await app.request('/todos')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ detail: 'Internal Server Error' })
  })
})
