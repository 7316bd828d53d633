/**
 * Pool Module
 *
 * The pool registry, its handles, and the sweep scheduler.
 */

export { PoolableHandle, type HandleHooks, type HandleState } from './handle'
export { PoolRegistry, type PoolRegistryOptions } from './registry'
export { PoolSweeper, type PoolSweeperDeps } from './sweeper'
