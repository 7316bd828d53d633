import { describe, expect, test, vi } from 'vitest'
import { FakeTemplate, createManualClock } from '../../test/fixtures'
import { type HandleState, PoolableHandle } from './handle'

function createHandle(createdByExpansion = false) {
  const clock = createManualClock(100)
  const onRelease = vi.fn()
  const template = new FakeTemplate('bullet')
  const state: HandleState = { active: false, alive: true, lastReleasedAt: clock.now() }
  const handle = new PoolableHandle({
    id: 7,
    template,
    resource: template.instantiate(),
    createdByExpansion,
    state,
    hooks: { now: clock.now, onRelease },
  })
  return { handle, state, clock, onRelease }
}

describe('PoolableHandle', () => {
  test('copies the tag from its template and starts idle and alive', () => {
    const { handle } = createHandle()

    expect(handle.tag).toBe('bullet')
    expect(handle.label).toBe('bullet#7')
    expect(handle.active).toBe(false)
    expect(handle.alive).toBe(true)
    expect(handle.lastReleasedAt).toBe(100)
  })

  test('labels expansion handles', () => {
    const { handle } = createHandle(true)

    expect(handle.label).toBe('bullet#7 (expansion)')
    expect(handle.createdByExpansion).toBe(true)
  })

  test('reads lease state written by its owner', () => {
    const { handle, state } = createHandle()

    state.active = true

    expect(handle.active).toBe(true)
  })

  test('release stamps the time and notifies the registry', () => {
    const { handle, state, clock, onRelease } = createHandle()
    state.active = true
    clock.advance(900)

    expect(handle.release()).toBe(true)
    expect(state).toEqual({ active: false, alive: true, lastReleasedAt: 1_000 })
    expect(handle.lastReleasedAt).toBe(1_000)
    expect(onRelease).toHaveBeenCalledWith(handle)
  })

  test('release on an idle handle does nothing', () => {
    const { handle, onRelease } = createHandle()

    expect(handle.release()).toBe(false)
    expect(onRelease).not.toHaveBeenCalled()
  })

  test('a destroyed handle is idle, dead and cannot be released', () => {
    const { handle, state, onRelease } = createHandle()
    state.active = true

    handle.markDestroyed()

    expect(handle.alive).toBe(false)
    expect(handle.active).toBe(false)
    expect(handle.release()).toBe(false)
    expect(onRelease).not.toHaveBeenCalled()
  })
})
