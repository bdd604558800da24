import { readInteger } from './env.js'

export default {
  port: readInteger('PORT', 3000),
}
