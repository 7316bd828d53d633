/**
 * Prometheus Registry
 *
 * Central registry for all metrics. Separated to avoid circular imports.
 */

import { Gauge, Registry, collectDefaultMetrics } from 'prom-client'

// Create a custom registry (allows isolation in tests)
export const registry = new Registry()

/**
 * Add default Node.js metrics (process CPU, memory, event loop lag, etc.).
 * Only the long-running process opts in; the CLI and tests do not.
 */
export function enableDefaultMetrics(): void {
  collectDefaultMetrics({ register: registry })
}

// Process start time
export const startTime = new Gauge({
  name: 'reservoir_start_time_seconds',
  help: 'Unix timestamp when the process started',
  registers: [registry],
})
startTime.set(Math.floor(Date.now() / 1000))
