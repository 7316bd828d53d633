/**
 * Pool Host
 *
 * Wires a PoolRegistry for a process: loads preset groups, prewarms once,
 * and starts the sweep schedule. The returned registry is what the host
 * passes to every component that needs pooling.
 */

import type { PresetGroup } from '@reservoir/core'
import type { ReservoirConfig } from './config'
import type { Logger } from './logger'
import { PoolRegistry, PoolSweeper } from './pool'
import { loadPresetsFromDir } from './presets'
import { TemplateCatalog } from './template'

export interface PoolHostDeps {
  config: ReservoirConfig
  logger: Logger
  catalog?: TemplateCatalog
  clock?: () => number
}

export interface PoolHost {
  registry: PoolRegistry
  sweeper: PoolSweeper
  groups: PresetGroup[]
  shutdown(): void
}

export function createPoolHost(deps: PoolHostDeps): PoolHost {
  const { config, logger, clock } = deps
  const log = logger.child({ component: 'PoolHost' })

  const groups = loadPresetsFromDir(config.presetsDir, {
    catalog: deps.catalog ?? new TemplateCatalog(),
    logger: log,
  })

  const registry = new PoolRegistry({ logger, clock })
  registry.prewarm(groups)

  const sweeper = new PoolSweeper({
    registry,
    logger,
    clock,
    intervalMs: config.sweep.intervalMs,
    initialDelayMs: config.sweep.initialDelayMs,
    expirationThresholdMs: config.sweep.expirationThresholdMs,
  })
  sweeper.start()

  return {
    registry,
    sweeper,
    groups,
    shutdown() {
      sweeper.stop()
      registry.close()
      log.info({ stats: registry.getStats() }, 'Pool host stopped')
    },
  }
}
