/**
 * Template Catalog
 *
 * Named ResourceTemplates supplied by the host. Preset files refer to
 * templates by catalog name.
 */

import type { ResourceTemplate } from '@reservoir/core'
import { TemplateConflictError } from '../errors'

export class TemplateCatalog<T = unknown> {
  private templates: Map<string, ResourceTemplate<T>> = new Map()

  constructor(entries?: Iterable<[string, ResourceTemplate<T>]>) {
    if (entries) {
      for (const [name, template] of entries) {
        this.register(name, template)
      }
    }
  }

  /**
   * Register a template under a unique name
   */
  register(name: string, template: ResourceTemplate<T>): this {
    if (this.templates.has(name)) {
      throw new TemplateConflictError(name)
    }
    this.templates.set(name, template)
    return this
  }

  get(name: string): ResourceTemplate<T> | undefined {
    return this.templates.get(name)
  }

  has(name: string): boolean {
    return this.templates.has(name)
  }

  names(): string[] {
    return Array.from(this.templates.keys())
  }

  get size(): number {
    return this.templates.size
  }
}
