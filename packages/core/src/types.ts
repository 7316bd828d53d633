/**
 * Core types for the Reservoir object pool
 */

import type { PoolTag, ResourceTemplate } from './template'

// =============================================================================
// Presets
// =============================================================================

/**
 * Static configuration describing a resource template, how many instances to
 * create eagerly, and whether its pool may grow on demand.
 * Read-only to the registry.
 */
export interface PoolPreset<T = unknown> {
  /**
   * Blueprint to instantiate. Null when the configured template could not be
   * resolved; prewarm and expansion skip such presets.
   */
  template: ResourceTemplate<T> | null

  /**
   * Informational label from configuration. Matching uses `template.tag`.
   * @example 'bullet'
   */
  tag?: PoolTag

  /**
   * Number of handles created eagerly by prewarm.
   * @example 3
   */
  initialCount: number

  /**
   * Whether an exhausted pool may create additional instances on acquire.
   */
  expandable: boolean
}

/**
 * Ordered collection of presets, usually one preset file.
 */
export interface PresetGroup<T = unknown> {
  /**
   * @example 'projectiles'
   */
  name: string

  presets: PoolPreset<T>[]
}

// =============================================================================
// Registry Results
// =============================================================================

/**
 * Outcome of a single acquire call.
 * - `hit`: an idle handle was reused
 * - `expanded`: the pool grew by one handle
 * - `exhausted`: the tag is known but its preset is not expandable
 * - `unknown`: no preset carries this tag
 */
export type AcquireOutcome = 'hit' | 'expanded' | 'exhausted' | 'unknown'

/**
 * Handle ids touched by one sweep pass.
 */
export interface SweepResult {
  /** Dangling handles dropped from the collection */
  pruned: number[]

  /** Expired expansion handles removed and destroyed */
  evicted: number[]

  /** Evicted handles whose template failed to destroy the resource */
  failed: number[]
}

/**
 * Per-tag counts.
 */
export interface TagStats {
  total: number
  active: number
  idle: number
  expansion: number
}

/**
 * Snapshot of the registry's handle collection.
 */
export interface PoolStats {
  total: number
  active: number
  idle: number
  expansion: number
  dangling: number
  byTag: Record<PoolTag, TagStats>
}
