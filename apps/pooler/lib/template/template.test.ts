import { describe, expect, test } from 'vitest'
import { FakeTemplate } from '../../test/fixtures'
import { TemplateConflictError } from '../errors'
import { TemplateCatalog } from './catalog'
import { PrototypeTemplate } from './prototype'

describe('TemplateCatalog', () => {
  test('registers and looks up templates by name', () => {
    const bullet = new FakeTemplate('bullet')
    const catalog = new TemplateCatalog([['bullet-small', bullet]])

    expect(catalog.get('bullet-small')).toBe(bullet)
    expect(catalog.has('bullet-small')).toBe(true)
    expect(catalog.get('missing')).toBeUndefined()
    expect(catalog.names()).toEqual(['bullet-small'])
    expect(catalog.size).toBe(1)
  })

  test('rejects a duplicate name', () => {
    const catalog = new TemplateCatalog().register('bullet', new FakeTemplate('bullet'))

    expect(() => catalog.register('bullet', new FakeTemplate('other'))).toThrow(TemplateConflictError)
  })
})

describe('PrototypeTemplate', () => {
  test('instantiates independent deep clones', () => {
    const template = new PrototypeTemplate('spark', { color: 'red', offset: { x: 1, y: 2 } })

    const a = template.instantiate()
    const b = template.instantiate()

    expect(a).toEqual({ color: 'red', offset: { x: 1, y: 2 } })
    expect(a).not.toBe(b)
    expect(a.offset).not.toBe(b.offset)
  })

  test('destroy clears the instance and counts it', () => {
    const template = new PrototypeTemplate('spark', { color: 'red' })
    const instance = template.instantiate()

    template.destroy(instance)

    expect(instance).toEqual({})
    expect(template.destroyedCount).toBe(1)
    expect(template.instantiate()).toEqual({ color: 'red' })
  })
})
