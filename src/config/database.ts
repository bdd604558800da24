import { readInteger, readString } from './env.js'

export default {
  file: readString('DB_FILE', 'todos.db'),
  busyTimeoutMs: readInteger('DB_BUSY_TIMEOUT_MS', 5000),
}
