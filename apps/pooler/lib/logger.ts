/**
 * Structured Logger
 *
 * pino logger shared by the registry, sweeper and host wiring. Components
 * derive a child logger tagged with their name.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ name: 'reservoir', level })
}
