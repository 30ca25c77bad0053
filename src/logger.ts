import pino from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const level = value?.toLowerCase()
  return LEVELS.find(candidate => candidate === level) ?? 'warn'
}

// Diagnostics go to stderr; stdout carries only the simulator's output
export const logger: Logger = pino(
  {
    name: 'cachesim',
    level: resolveLogLevel(process.env.LOG_LEVEL),
    formatters: {
      level(label: string) {
        return { level: label }
      },
    },
  },
  pino.destination(2)
)

export function getLogger(module: string): Logger {
  return logger.child({ module })
}
