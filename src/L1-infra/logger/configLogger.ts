import winston from 'winston'

/**
 * Sanitize user input for logging to prevent log injection.
 * Escapes newlines, carriage returns and tabs.
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

// ffmpeg owns stdout while it runs, so log lines go to stderr
const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

export default logger
