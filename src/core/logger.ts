import type { LevelWithSilent, Logger } from 'pino'
import pino from 'pino'

export function createLogger(level: LevelWithSilent = 'silent'): Logger {
  return pino({
    name: 'auth-refresh-coordinator',
    level,
    formatters: {
      level: label => ({ level: label }),
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  })
}
