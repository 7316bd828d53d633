/**
 * Resource Template Interface
 *
 * Abstracts how pooled resources are created and torn down, so the pool
 * registry never has to know what it is pooling:
 * - Prototype objects cloned from preset files (built in)
 * - Host-defined entities registered in a template catalog
 *
 * The PoolRegistry works with this interface only. It never inspects the
 * resources a template produces; it tracks their lifecycle flags.
 */

/**
 * Identifier shared by a template and every resource created from it.
 * Matching is exact string equality.
 * @example 'bullet'
 * @example 'explosion-fx'
 */
export type PoolTag = string

/**
 * Blueprint for a family of same-shaped resources.
 */
export interface ResourceTemplate<T = unknown> {
  /**
   * Stable tag copied onto every handle created from this template.
   * @example 'bullet'
   */
  readonly tag: PoolTag

  /**
   * Produce a fresh resource. Called by prewarm and by on-demand expansion.
   */
  instantiate(): T

  /**
   * Irrevocably release a resource. Called only when the idle-expiry sweep
   * evicts a handle; a resource is never handed out again afterwards.
   */
  destroy(resource: T): void
}
