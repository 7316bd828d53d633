import { formatDuration } from '@reservoir/core'
import { config } from '../lib/config'
import { isPoolError } from '../lib/errors'
import { type PoolHost, createPoolHost } from '../lib/host'
import { createLogger } from '../lib/logger'
import { enableDefaultMetrics } from '../lib/metrics'

const logger = createLogger(config.logLevel)

logger.info(
  {
    presetsDir: config.presetsDir,
    sweepInterval: formatDuration(config.sweep.intervalMs),
    sweepDelay: formatDuration(config.sweep.initialDelayMs),
    expiration: formatDuration(config.sweep.expirationThresholdMs),
  },
  'Starting Reservoir pool host',
)

enableDefaultMetrics()

let host: PoolHost
try {
  host = createPoolHost({ config, logger })
} catch (err) {
  logger.fatal({ err, code: isPoolError(err) ? err.code : undefined }, 'Pool host failed to start')
  process.exit(1)
}

const stats = host.registry.getStats()
logger.info(
  {
    groups: host.groups.map((group) => group.name),
    handles: stats.total,
    tags: Object.keys(stats.byTag),
  },
  'Pool host ready',
)

// The sweeper's timers are unref'd; hold the process open until a signal arrives
const keepAlive = setInterval(() => {}, 1 << 30)

function shutdown(): void {
  clearInterval(keepAlive)
  host.shutdown()
  process.exit(0)
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)
