/**
 * Structured logging on winston.
 * Every module asks for its own child logger so lines carry a `[module]` tag.
 */
import winston from 'winston'
import loggerConfig from '../config/logger.js'

export type Logger = winston.Logger

const rootLogger = winston.createLogger({
  level: loggerConfig.level,
  silent: loggerConfig.silent,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat()
  ),
  transports: [
    new winston.transports.Console({
      // stdout belongs to the MCP stdio transport when that entry point runs
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, module, stack }) => {
          const moduleString = typeof module === 'string' ? ` [${module}]` : ''
          const line = `[${String(timestamp)}] [${level}]${moduleString} ${String(message)}`
          return typeof stack === 'string' ? `${line}\n${stack}` : line
        })
      ),
    }),
  ],
  exitOnError: false,
})

const moduleLoggers = new Map<string, Logger>()

export function getLogger (module: string): Logger {
  let logger = moduleLoggers.get(module)
  if (!logger) {
    logger = rootLogger.child({ module })
    moduleLoggers.set(module, logger)
  }
  return logger
}

export default rootLogger
