/**
 * Shared test fixtures using Faker.js
 *
 * Provides factory functions for templates, presets and registries.
 */

import { faker } from '@faker-js/faker'
import type { PoolPreset, PoolStats, PoolTag, PresetGroup, ResourceTemplate } from '@reservoir/core'
import pino from 'pino'
import { vi } from 'vitest'
import type { PoolMetrics } from '../lib/metrics'
import { PoolRegistry } from '../lib/pool'

export const silentLogger = pino({ level: 'silent' })

// =============================================================================
// Clock
// =============================================================================

export interface ManualClock {
  now: () => number
  advance(ms: number): void
  set(ms: number): void
}

export function createManualClock(start = 1_000): ManualClock {
  let current = start
  return {
    now: () => current,
    advance(ms) {
      current += ms
    },
    set(ms) {
      current = ms
    },
  }
}

// =============================================================================
// Templates
// =============================================================================

export interface FakeResource {
  serial: number
  tag: PoolTag
  destroyed: boolean
}

/**
 * Template producing numbered objects and recording every destroy call.
 */
export class FakeTemplate implements ResourceTemplate<FakeResource> {
  private serial = 0
  readonly destroyed: FakeResource[] = []
  failOnDestroy = false

  constructor(readonly tag: PoolTag) {}

  instantiate(): FakeResource {
    this.serial++
    return { serial: this.serial, tag: this.tag, destroyed: false }
  }

  destroy(resource: FakeResource): void {
    if (this.failOnDestroy) {
      throw new Error(`destroy failed for ${this.tag}#${resource.serial}`)
    }
    resource.destroyed = true
    this.destroyed.push(resource)
  }

  get created(): number {
    return this.serial
  }
}

export function createTag(): PoolTag {
  return `${faker.word.noun().toLowerCase()}-${faker.string.alphanumeric(6).toLowerCase()}`
}

// =============================================================================
// Presets
// =============================================================================

export function createPreset(
  overrides?: Partial<PoolPreset<FakeResource>>,
): PoolPreset<FakeResource> {
  const template = overrides?.template === undefined ? new FakeTemplate(createTag()) : overrides.template
  return {
    template,
    tag: template?.tag,
    initialCount: faker.number.int({ min: 1, max: 5 }),
    expandable: false,
    ...overrides,
  }
}

export function createGroup(
  presets: PoolPreset<FakeResource>[],
  name: string = faker.word.noun(),
): PresetGroup<FakeResource> {
  return { name, presets }
}

// =============================================================================
// Registry
// =============================================================================

export function createNoopMetrics() {
  const untrack = vi.fn()
  const metrics = {
    recordAcquire: vi.fn(),
    recordEviction: vi.fn(),
    recordDanglingPruned: vi.fn(),
    recordDestroyFailure: vi.fn(),
    track: vi.fn((_source: () => PoolStats) => untrack),
  } satisfies PoolMetrics
  return { metrics, untrack }
}

export function createTestRegistry(clock: ManualClock = createManualClock()) {
  const { metrics, untrack } = createNoopMetrics()
  const registry = new PoolRegistry<FakeResource>({
    logger: silentLogger,
    clock: clock.now,
    metrics,
  })
  return { registry, clock, metrics, untrack }
}
