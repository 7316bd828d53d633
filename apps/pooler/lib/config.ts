import { resolve } from 'node:path'
import { parseDuration } from '@reservoir/core'

type Env = Record<string, string | undefined>

/**
 * Reads a duration in milliseconds. Accepts a plain integer ("10000") or a
 * duration string ("10s", "2m").
 */
function getEnvDuration(env: Env, key: string, defaultValue: number): number {
  const value = env[key]
  if (value === undefined || value === '') return defaultValue
  if (/^\d+$/.test(value)) return Number.parseInt(value, 10)
  try {
    return parseDuration(value)
  } catch {
    return defaultValue
  }
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue
}

function getEnvPath(env: Env, key: string, defaultValue: string): string {
  const value = env[key] ?? defaultValue
  // Resolve relative paths from current working directory
  return value.startsWith('/') ? value : resolve(process.cwd(), value)
}

export interface ReservoirConfig {
  /** Directory of preset YAML files */
  presetsDir: string

  logLevel: string

  sweep: {
    /** Delay before the first sweep */
    initialDelayMs: number
    /** Period between sweeps */
    intervalMs: number
    /** Idle time after which an expansion-created handle is evicted */
    expirationThresholdMs: number
  }
}

export const DEFAULT_SWEEP_INTERVAL_MS = 10 * 1000
export const DEFAULT_EXPIRATION_MS = 10 * 1000

export function loadConfig(env: Env = process.env): ReservoirConfig {
  return {
    presetsDir: getEnvPath(env, 'RESERVOIR_PRESETS_DIR', 'presets'),
    logLevel: getEnvString(env, 'RESERVOIR_LOG_LEVEL', 'info'),
    sweep: {
      initialDelayMs: getEnvDuration(env, 'RESERVOIR_SWEEP_DELAY_MS', DEFAULT_SWEEP_INTERVAL_MS),
      intervalMs: getEnvDuration(env, 'RESERVOIR_SWEEP_INTERVAL_MS', DEFAULT_SWEEP_INTERVAL_MS),
      expirationThresholdMs: getEnvDuration(env, 'RESERVOIR_EXPIRATION_MS', DEFAULT_EXPIRATION_MS),
    },
  }
}

export const config: ReservoirConfig = loadConfig()
