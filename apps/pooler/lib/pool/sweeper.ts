/**
 * Pool Sweeper
 *
 * Host-side scheduler for the registry's idle-expiry sweep. Waits
 * `initialDelayMs`, then calls `registry.sweep(now, threshold)` every
 * `intervalMs` until stopped.
 *
 * The loop uses self-scheduling setTimeout so a slow sweep never stacks, and
 * unref'd timers so the sweeper alone never keeps the process alive.
 */

import type { SweepResult } from '@reservoir/core'
import type { Logger } from '../logger'
import { poolSweepDuration } from '../metrics'
import type { PoolRegistry } from './registry'

const DEFAULT_INTERVAL_MS = 10_000
const DEFAULT_EXPIRATION_MS = 10_000

export interface PoolSweeperDeps<T> {
  registry: PoolRegistry<T>
  logger: Logger
  /** Period between sweeps (default: 10000ms) */
  intervalMs?: number
  /** Delay before the first sweep (default: intervalMs) */
  initialDelayMs?: number
  /** Idle time after which expansion handles are evicted (default: 10000ms) */
  expirationThresholdMs?: number
  /** Millisecond clock passed to each sweep (default: Date.now) */
  clock?: () => number
}

export class PoolSweeper<T = unknown> {
  private registry: PoolRegistry<T>
  private log: Logger
  private intervalMs: number
  private initialDelayMs: number
  private expirationThresholdMs: number
  private clock: () => number
  private timer: ReturnType<typeof setTimeout> | null = null

  constructor(deps: PoolSweeperDeps<T>) {
    this.registry = deps.registry
    this.log = deps.logger.child({ component: 'PoolSweeper' })
    this.intervalMs = deps.intervalMs ?? DEFAULT_INTERVAL_MS
    this.initialDelayMs = deps.initialDelayMs ?? this.intervalMs
    this.expirationThresholdMs = deps.expirationThresholdMs ?? DEFAULT_EXPIRATION_MS
    this.clock = deps.clock ?? Date.now
  }

  get isRunning(): boolean {
    return this.timer !== null
  }

  /**
   * Start the sweep loop. No-op if already running.
   */
  start(): void {
    if (this.timer) return
    this.log.debug(
      {
        initialDelayMs: this.initialDelayMs,
        intervalMs: this.intervalMs,
        expirationThresholdMs: this.expirationThresholdMs,
      },
      'Sweeper started',
    )
    this.schedule(this.initialDelayMs)
  }

  /**
   * Cancel the pending sweep. Safe to call when not running.
   */
  stop(): void {
    if (!this.timer) return
    clearTimeout(this.timer)
    this.timer = null
    this.log.debug('Sweeper stopped')
  }

  /**
   * Run one sweep now. Errors are logged, never thrown, so the loop survives.
   */
  runOnce(): SweepResult | null {
    const endTimer = poolSweepDuration.startTimer()
    try {
      return this.registry.sweep(this.clock(), this.expirationThresholdMs)
    } catch (err) {
      this.log.error({ err }, 'Sweep failed')
      return null
    } finally {
      endTimer()
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.runOnce()
      // stop() may have been called from inside the sweep
      if (this.timer) {
        this.schedule(this.intervalMs)
      }
    }, delayMs)
    this.timer.unref()
  }
}
