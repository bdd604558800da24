import { readBoolean, readString } from './env.js'

export default {
  level: readString('LOG_LEVEL', 'info'),
  silent: readBoolean('LOG_SILENT', process.env.NODE_ENV === 'test'),
}
