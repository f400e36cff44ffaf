import type { LevelWithSilent } from 'pino'

const LEVELS: ReadonlyArray<LevelWithSilent> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

/**
 * Map a LOG_LEVEL value onto a Pino level, defaulting to info
 */
export function parseLevel(value: string | undefined): LevelWithSilent {
  const match = LEVELS.find(level => level === value)
  return match ?? 'info'
}
