/**
 * Pool Registry
 *
 * Owns the preset list and every live PoolableHandle. Prewarms handles from
 * preset groups, hands out idle handles by tag, grows expandable pools on
 * demand, and sweeps away expansion-created handles that sat idle too long.
 *
 * All operations are synchronous. On the Node.js event loop that makes the
 * scan-then-activate step of `acquire` and the removal loop of `sweep` atomic
 * with respect to every other caller, so no locking is needed.
 *
 * The registry is constructed once by the host and passed to whatever needs
 * pooling; there is no global instance. It owns no timers: the host drives
 * `sweep` (see PoolSweeper) with the current time.
 *
 * Lease state lives in a HandleState the registry keeps beside each handle.
 * Callers can read it and `release()`, but only `acquire` and
 * `deactivateAll` flip a handle to active or force it idle.
 */

import type {
  PoolPreset,
  PoolStats,
  PoolTag,
  PresetGroup,
  SweepResult,
  TagStats,
} from '@reservoir/core'
import { DuplicateResourceError } from '../errors'
import type { Logger } from '../logger'
import { type PoolMetrics, prometheusPoolMetrics } from '../metrics'
import { type HandleHooks, type HandleState, PoolableHandle } from './handle'

export interface PoolRegistryOptions {
  logger: Logger
  /** Millisecond clock used to stamp handles (default: Date.now) */
  clock?: () => number
  /** Metrics sink (default: prom-client metrics) */
  metrics?: PoolMetrics
}

interface HandleEntry<T> {
  handle: PoolableHandle<T>
  state: HandleState
}

export class PoolRegistry<T = unknown> {
  private presets: PoolPreset<T>[] = []
  private entries: HandleEntry<T>[] = []
  /** Resources currently tracked, to reject a template returning one twice */
  private resources = new Set<T>()
  private nextId = 1
  private prewarmed = false
  private clock: () => number
  private metrics: PoolMetrics
  private log: Logger
  private hooks: HandleHooks<T>
  private untrack: () => void

  constructor(options: PoolRegistryOptions) {
    this.clock = options.clock ?? Date.now
    this.metrics = options.metrics ?? prometheusPoolMetrics
    this.log = options.logger.child({ component: 'PoolRegistry' })
    this.hooks = {
      now: () => this.clock(),
      onRelease: (handle) => {
        this.log.debug({ handle: handle.label }, 'Handle released')
      },
    }
    this.untrack = this.metrics.track(() => this.getStats())
  }

  /**
   * Ingest preset groups and create the initial handles.
   *
   * Presets are flattened in group order, then preset order, with no
   * de-duplication. Presets with no template or a zero count create nothing.
   * Returns the number of handles created.
   */
  prewarm(groups: PresetGroup<T>[]): number {
    if (this.prewarmed) {
      this.log.warn('Prewarm called more than once; appending presets')
    }
    this.prewarmed = true

    let created = 0
    for (const group of groups) {
      for (const preset of group.presets) {
        this.presets.push(preset)

        if (!preset.template) {
          this.log.debug(
            { group: group.name, tag: preset.tag },
            'Skipping preset without template',
          )
          continue
        }

        for (let i = 0; i < preset.initialCount; i++) {
          this.createHandle(preset.template, false)
          created++
        }
      }
    }

    this.log.info({ presets: this.presets.length, handles: created }, 'Pool prewarmed')
    return created
  }

  /**
   * Lease a handle for the given tag.
   *
   * Priority:
   * 1. The first idle, alive handle with this tag (insertion order)
   * 2. If the first preset for this tag is expandable, one new handle
   * 3. Otherwise undefined: the pool is exhausted or the tag is unknown
   */
  acquire(tag: PoolTag): PoolableHandle<T> | undefined {
    for (const { handle, state } of this.entries) {
      if (!state.alive) {
        this.log.debug({ handle: handle.label }, 'Skipping dangling handle')
        continue
      }
      if (handle.tag === tag && !state.active) {
        state.active = true
        this.metrics.recordAcquire(tag, 'hit')
        return handle
      }
    }

    const preset = this.findPreset(tag)
    if (!preset?.template) {
      this.metrics.recordAcquire(tag, 'unknown')
      return undefined
    }

    if (!preset.expandable) {
      this.metrics.recordAcquire(tag, 'exhausted')
      return undefined
    }

    const { handle, state } = this.createHandle(preset.template, true)
    state.active = true
    this.log.debug({ handle: handle.label, size: this.entries.length }, 'Pool expanded')
    this.metrics.recordAcquire(tag, 'expanded')
    return handle
  }

  /**
   * Every alive handle with this tag, active or idle, in collection order.
   */
  allWithTag(tag: PoolTag): PoolableHandle<T>[] {
    const matches: PoolableHandle<T>[] = []
    for (const { handle, state } of this.entries) {
      if (state.alive && handle.tag === tag) matches.push(handle)
    }
    return matches
  }

  /**
   * Whether an idle handle with this tag is sitting in the pool right now.
   * Presets are not consulted: an expandable but exhausted tag is unavailable.
   */
  isAvailable(tag: PoolTag): boolean {
    return this.entries.some(
      ({ handle, state }) => state.alive && !state.active && handle.tag === tag,
    )
  }

  /**
   * Drop dangling handles, then evict expansion-created handles that have been
   * idle for at least `expirationThresholdMs` as of `now`.
   *
   * Each eviction is independent: a template that throws while destroying one
   * resource is logged and the handle is still removed.
   */
  sweep(now: number, expirationThresholdMs: number): SweepResult {
    const result: SweepResult = { pruned: [], evicted: [], failed: [] }
    const kept: HandleEntry<T>[] = []
    const expired: PoolableHandle<T>[] = []

    for (const entry of this.entries) {
      const { handle, state } = entry
      if (!state.alive) {
        result.pruned.push(handle.id)
        this.resources.delete(handle.resource)
        this.metrics.recordDanglingPruned(handle.tag)
        continue
      }
      if (
        handle.createdByExpansion &&
        !state.active &&
        now - state.lastReleasedAt >= expirationThresholdMs
      ) {
        expired.push(handle)
        continue
      }
      kept.push(entry)
    }

    this.entries = kept

    for (const handle of expired) {
      this.resources.delete(handle.resource)
      handle.markDestroyed()
      result.evicted.push(handle.id)
      this.metrics.recordEviction(handle.tag)

      try {
        handle.template.destroy(handle.resource)
      } catch (err) {
        result.failed.push(handle.id)
        this.metrics.recordDestroyFailure(handle.tag)
        this.log.error({ err, handle: handle.label }, 'Failed to destroy evicted resource')
      }
    }

    if (result.pruned.length > 0 || result.evicted.length > 0) {
      this.log.info(
        {
          pruned: result.pruned.length,
          evicted: result.evicted.length,
          failed: result.failed.length,
          size: this.entries.length,
        },
        'Pool swept',
      )
    }

    return result
  }

  /**
   * Force every active handle back to idle, e.g. on a scene reset.
   * Leaves `lastReleasedAt` untouched and removes nothing.
   * Returns the number of handles reset.
   */
  deactivateAll(): number {
    let reset = 0
    for (const { state } of this.entries) {
      if (state.active) {
        state.active = false
        reset++
      }
    }

    if (reset > 0) {
      this.log.info({ reset }, 'Deactivated all active handles')
    }
    return reset
  }

  /**
   * Presets in ingestion order.
   */
  getPresets(): readonly PoolPreset<T>[] {
    return this.presets
  }

  /**
   * Handles in collection order, including dangling ones not yet swept.
   */
  getHandles(): readonly PoolableHandle<T>[] {
    return this.entries.map((entry) => entry.handle)
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * Snapshot of handle counts. Tags are arbitrary strings, so per-tag counts
   * are gathered in a Map and `byTag` only ever holds own properties.
   */
  getStats(): PoolStats {
    const stats: PoolStats = { total: 0, active: 0, idle: 0, expansion: 0, dangling: 0, byTag: {} }
    const byTag = new Map<PoolTag, TagStats>()

    for (const { handle, state } of this.entries) {
      if (!state.alive) {
        stats.dangling++
        continue
      }

      let tagStats = byTag.get(handle.tag)
      if (!tagStats) {
        tagStats = { total: 0, active: 0, idle: 0, expansion: 0 }
        byTag.set(handle.tag, tagStats)
      }

      stats.total++
      tagStats.total++
      if (state.active) {
        stats.active++
        tagStats.active++
      } else {
        stats.idle++
        tagStats.idle++
      }
      if (handle.createdByExpansion) {
        stats.expansion++
        tagStats.expansion++
      }
    }

    stats.byTag = Object.fromEntries(byTag)
    return stats
  }

  /**
   * Stop reporting this registry's handles to metrics.
   */
  close(): void {
    this.untrack()
  }

  private findPreset(tag: PoolTag): PoolPreset<T> | undefined {
    return this.presets.find((preset) => preset.template?.tag === tag)
  }

  private createHandle(
    template: NonNullable<PoolPreset<T>['template']>,
    createdByExpansion: boolean,
  ): HandleEntry<T> {
    const resource = template.instantiate()
    if (this.resources.has(resource)) {
      throw new DuplicateResourceError(template.tag)
    }

    const state: HandleState = { active: false, alive: true, lastReleasedAt: this.clock() }
    const handle = new PoolableHandle<T>({
      id: this.nextId++,
      template,
      resource,
      createdByExpansion,
      state,
      hooks: this.hooks,
    })
    const entry = { handle, state }
    this.entries.push(entry)
    this.resources.add(resource)
    return entry
  }
}
