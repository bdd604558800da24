import { z } from 'zod'
import { ValidationError, type ValidationIssue } from '../error/app.error.js'

export const TodoSchema = z.object({
  todo_id: z.number().int().describe('Unique identifier for the todo'),
  content: z.string().describe('The todo item content'),
  completed: z.boolean().describe('Whether the todo is completed'),
})

export const CreateTodoSchema = z.object({
  content: z.string().min(1).describe('The todo item content'),
  completed: z.boolean().default(false).describe('Whether the todo is completed'),
})

// null is accepted and treated the same as leaving the field out
export const UpdateTodoSchema = z.object({
  content: z.string().min(1).nullish().describe('The todo item content'),
  completed: z.boolean().nullish().describe('Whether the todo is completed'),
})

export const TodoIdSchema = z.number().int().safe().describe('The unique identifier of the todo item')

// digits beyond 2^53 would round to a different id
export const TodoIdParamSchema = z.string()
  .regex(/^-?\d+$/, 'Input should be a valid integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'Input should be a safe integer')

export type Todo = z.infer<typeof TodoSchema>
export type CreateTodoInput = z.output<typeof CreateTodoSchema>
export type UpdateTodoInput = z.output<typeof UpdateTodoSchema>

/**
 * Fields to change on update. A key is present only when the caller supplied
 * a value for it.
 */
export interface TodoPatch {
  content?: string
  completed?: boolean
}

export type InputLocation = 'body' | 'path' | 'tool'

export function toTodoPatch (input: UpdateTodoInput): TodoPatch {
  const patch: TodoPatch = {}
  if (input.content !== undefined && input.content !== null) patch.content = input.content
  if (input.completed !== undefined && input.completed !== null) patch.completed = input.completed
  return patch
}

export function toValidationIssues (error: z.ZodError, location: InputLocation, prefix: (string | number)[] = []): ValidationIssue[] {
  return error.issues.map(issue => ({
    loc: [location, ...prefix, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }))
}

export function parseInput<S extends z.ZodTypeAny> (schema: S, data: unknown, location: InputLocation, prefix: (string | number)[] = []): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new ValidationError(toValidationIssues(result.error, location, prefix))
  }
  return result.data
}

export function parseCreateInput (data: unknown): CreateTodoInput {
  return parseInput(CreateTodoSchema, data, 'body')
}

export function parseTodoPatch (data: unknown): TodoPatch {
  return toTodoPatch(parseInput(UpdateTodoSchema, data, 'body'))
}

export function parseTodoId (raw: unknown): number {
  return parseInput(TodoIdParamSchema, raw, 'path', ['todo_id'])
}
