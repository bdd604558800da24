import 'dotenv/config'
import { handle } from 'hono/aws-lambda'
import { createApp } from './app.js'
import { bootstrap } from './bootstrap.js'

// created once per Lambda container, reused across invocations
const { todoService } = bootstrap()

export const app = createApp(todoService)
export const handler = handle(app)
