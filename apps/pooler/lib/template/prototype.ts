/**
 * Prototype Template
 *
 * ResourceTemplate for plain data objects declared inline in a preset file.
 * Every instance is a deep clone of the prototype.
 */

import type { PoolTag, ResourceTemplate } from '@reservoir/core'

export type PrototypeResource = Record<string, unknown>

export class PrototypeTemplate implements ResourceTemplate<PrototypeResource> {
  private _destroyed = 0

  constructor(
    readonly tag: PoolTag,
    private readonly prototype: PrototypeResource,
  ) {}

  instantiate(): PrototypeResource {
    return structuredClone(this.prototype)
  }

  destroy(resource: PrototypeResource): void {
    for (const key of Object.keys(resource)) {
      delete resource[key]
    }
    this._destroyed++
  }

  /** Number of instances destroyed so far */
  get destroyedCount(): number {
    return this._destroyed
  }
}
