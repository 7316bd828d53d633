/**
 * Poolable Handle
 *
 * Per-instance bookkeeping for a pooled resource: its tag, whether it is
 * leased, how it was created, and when it last went idle. Handles are owned
 * by the PoolRegistry; callers receive them from `acquire` and hand the
 * resource back by calling `release()`.
 */

import type { PoolTag, ResourceTemplate } from '@reservoir/core'

/**
 * Lease state of one handle. Only the registry that created the handle holds
 * a writable reference; callers see it through the handle's getters.
 */
export interface HandleState {
  active: boolean
  alive: boolean
  /** Time of the last active → idle transition, or of creation */
  lastReleasedAt: number
}

/**
 * Callbacks a handle uses to reach its registry.
 */
export interface HandleHooks<T> {
  /** Current time in milliseconds */
  now(): number
  /** Invoked after an active → idle transition */
  onRelease(handle: PoolableHandle<T>): void
}

export interface PoolableHandleInit<T> {
  id: number
  template: ResourceTemplate<T>
  resource: T
  createdByExpansion: boolean
  state: HandleState
  hooks: HandleHooks<T>
}

export class PoolableHandle<T = unknown> {
  readonly id: number
  readonly tag: PoolTag
  readonly resource: T
  readonly template: ResourceTemplate<T>

  /** Diagnostic name, e.g. `bullet#4 (expansion)` */
  readonly label: string

  /** Always true for handles made by the registry */
  readonly createdByPool = true
  readonly createdByExpansion: boolean

  private state: HandleState
  private hooks: HandleHooks<T>

  constructor(init: PoolableHandleInit<T>) {
    this.id = init.id
    this.template = init.template
    this.tag = init.template.tag
    this.resource = init.resource
    this.createdByExpansion = init.createdByExpansion
    this.state = init.state
    this.hooks = init.hooks
    this.label = `${this.tag}#${init.id}${init.createdByExpansion ? ' (expansion)' : ''}`
  }

  /** Leased to a caller */
  get active(): boolean {
    return this.state.active
  }

  /** False once the resource is gone; dead handles are pruned by the sweep */
  get alive(): boolean {
    return this.state.alive
  }

  get lastReleasedAt(): number {
    return this.state.lastReleasedAt
  }

  /**
   * Return the resource to the pool. Stamps `lastReleasedAt` at this moment.
   * Returns false when the handle was not leased or is no longer alive.
   */
  release(): boolean {
    if (!this.state.active || !this.state.alive) return false
    this.state.active = false
    this.state.lastReleasedAt = this.hooks.now()
    this.hooks.onRelease(this)
    return true
  }

  /**
   * Signal that the resource was destroyed outside the pool. The handle is
   * never selected again and is dropped at the next sweep.
   */
  markDestroyed(): void {
    this.state.alive = false
    this.state.active = false
  }
}
