/**
 * Pool Metrics
 *
 * Gauges tracking handle counts per tag, counters for acquire outcomes and
 * sweep activity.
 *
 * Handle gauges are computed at scrape time from every tracked registry, so
 * acquire and release only touch counters.
 */

import type { AcquireOutcome, PoolStats, PoolTag } from '@reservoir/core'
import { Counter, Gauge, Histogram } from 'prom-client'
import { registry } from './registry'

type StatsSource = () => PoolStats

const trackedPools = new Set<StatsSource>()

export interface HandleCounts {
  idle: number
  active: number
}

/**
 * Sum idle and active handles per tag across registry snapshots.
 */
export function sumHandleCounts(snapshots: Iterable<PoolStats>): Map<PoolTag, HandleCounts> {
  const totals = new Map<PoolTag, HandleCounts>()
  for (const stats of snapshots) {
    for (const [tag, tagStats] of Object.entries(stats.byTag)) {
      const counts = totals.get(tag) ?? { idle: 0, active: 0 }
      counts.idle += tagStats.idle
      counts.active += tagStats.active
      totals.set(tag, counts)
    }
  }
  return totals
}

export const poolHandles = new Gauge({
  name: 'reservoir_pool_handles',
  help: 'Pooled handles by tag and state',
  labelNames: ['tag', 'state'] as const,
  registers: [registry],
  collect() {
    this.reset()
    const snapshots = Array.from(trackedPools, (source) => source())
    for (const [tag, counts] of sumHandleCounts(snapshots)) {
      this.set({ tag, state: 'idle' }, counts.idle)
      this.set({ tag, state: 'active' }, counts.active)
    }
  },
})

export const poolAcquireTotal = new Counter({
  name: 'reservoir_pool_acquire_total',
  help: 'Acquire calls by tag and outcome',
  labelNames: ['tag', 'outcome'] as const,
  registers: [registry],
})

export const poolEvictionsTotal = new Counter({
  name: 'reservoir_pool_evictions_total',
  help: 'Expansion-created handles evicted after idle expiry',
  labelNames: ['tag'] as const,
  registers: [registry],
})

export const poolDanglingPrunedTotal = new Counter({
  name: 'reservoir_pool_dangling_pruned_total',
  help: 'Handles dropped because their resource was destroyed outside the pool',
  labelNames: ['tag'] as const,
  registers: [registry],
})

export const poolDestroyFailuresTotal = new Counter({
  name: 'reservoir_pool_destroy_failures_total',
  help: 'Evictions whose template failed to destroy the resource',
  labelNames: ['tag'] as const,
  registers: [registry],
})

// Sweeps are in-memory scans, typically well under a millisecond
export const poolSweepDuration = new Histogram({
  name: 'reservoir_pool_sweep_duration_seconds',
  help: 'Time spent in one idle-expiry sweep',
  buckets: [0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [registry],
})

/**
 * Sink the registry reports to. The default writes to the prom-client
 * metrics above; tests may pass a no-op or a spy.
 */
export interface PoolMetrics {
  recordAcquire(tag: string, outcome: AcquireOutcome): void
  recordEviction(tag: string): void
  recordDanglingPruned(tag: string): void
  recordDestroyFailure(tag: string): void
  /**
   * Report a registry's handle counts whenever gauges are collected.
   * Returns a function that stops reporting.
   */
  track(source: StatsSource): () => void
}

export const prometheusPoolMetrics: PoolMetrics = {
  recordAcquire: (tag, outcome) => poolAcquireTotal.inc({ tag, outcome }),
  recordEviction: (tag) => poolEvictionsTotal.inc({ tag }),
  recordDanglingPruned: (tag) => poolDanglingPrunedTotal.inc({ tag }),
  recordDestroyFailure: (tag) => poolDestroyFailuresTotal.inc({ tag }),
  track: (source) => {
    trackedPools.add(source)
    return () => {
      trackedPools.delete(source)
    }
  },
}
