export const LOG_PREFIX = '[operator-status]'

export type StatusLogger = {
  info: (message: string, context?: Record<string, unknown>) => void
  warn: (message: string, context?: Record<string, unknown>) => void
}

export const createConsoleLogger = (prefix = LOG_PREFIX): StatusLogger => ({
  info: (message, context) => {
    if (context) {
      console.info(`${prefix} ${message}`, context)
    } else {
      console.info(`${prefix} ${message}`)
    }
  },
  warn: (message, context) => {
    if (context) {
      console.warn(`${prefix} ${message}`, context)
    } else {
      console.warn(`${prefix} ${message}`)
    }
  },
})
