import { describe, expect, test } from 'vitest'
import { formatDuration, parseDuration, parsePresetGroup, safeParsePresetGroup } from './preset'

describe('parseDuration', () => {
  test('parses each unit', () => {
    expect(parseDuration('250ms')).toBe(250)
    expect(parseDuration('10s')).toBe(10_000)
    expect(parseDuration('5m')).toBe(300_000)
    expect(parseDuration('1h')).toBe(3_600_000)
  })

  test('rejects malformed input', () => {
    expect(() => parseDuration('10')).toThrow('Invalid duration format: 10')
    expect(() => parseDuration('-5s')).toThrow()
  })
})

describe('formatDuration', () => {
  test('uses the largest whole unit', () => {
    expect(formatDuration(7_200_000)).toBe('2h')
    expect(formatDuration(120_000)).toBe('2m')
    expect(formatDuration(10_000)).toBe('10s')
    expect(formatDuration(1_500)).toBe('1500ms')
    expect(formatDuration(0)).toBe('0ms')
  })
})

describe('preset group schema', () => {
  test('applies defaults and converts to camelCase', () => {
    const group = parsePresetGroup({
      presets: [{ tag: 'bullet', template: 'bullet-small', initial_count: 4, expandable: true }, { tag: 'spark' }],
    })

    expect(group.name).toBeUndefined()
    expect(group.presets).toEqual([
      {
        tag: 'bullet',
        template: 'bullet-small',
        prototype: undefined,
        initialCount: 4,
        expandable: true,
      },
      {
        tag: 'spark',
        template: undefined,
        prototype: undefined,
        initialCount: 0,
        expandable: false,
      },
    ])
  })

  test('a file with no presets is an empty group', () => {
    expect(parsePresetGroup({ name: 'empty' })).toEqual({ name: 'empty', presets: [] })
  })

  test('reports every invalid field with its path', () => {
    const result = safeParsePresetGroup({
      presets: [{ tag: 'has space', initial_count: 1.5 }, { tag: 'ok', expandable: 'yes' }],
    })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.errors.map((e) => e.path)).toEqual([
      'presets.0.tag',
      'presets.0.initial_count',
      'presets.1.expandable',
    ])
    expect(result.errors[0].message).toBe('Must be alphanumeric with hyphens, dots or underscores')
  })

  test('a non-object document fails at the root', () => {
    const result = safeParsePresetGroup('just a string')

    expect(result).toEqual({
      success: false,
      errors: [{ path: '/', message: 'Expected object, received string' }],
    })
  })
})
