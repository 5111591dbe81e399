/**
 * Process-wide winston logger. Errors and warnings go to stderr, everything
 * else to stdout; `--verbose` lowers the level to `debug`.
 */
import winston from 'winston'

/**
 * Sanitize user input for logging to prevent log injection attacks.
 * Removes or escapes newlines, carriage returns, and other control characters.
 */
export function sanitizeForLog(value: unknown): string {
  if (value === null || value === undefined) return String(value)
  const str = String(value)
  return str.replace(/[\r\n\t]/g, (c) => {
    switch (c) {
      case '\r': return '\\r'
      case '\n': return '\\n'
      case '\t': return '\\t'
      default: return c
    }
  })
}

const LOG_FORMAT = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`
  })
)

const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

export default logger
