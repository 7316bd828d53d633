/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all Reservoir metrics.
 * Follows Prometheus naming conventions with reservoir_ prefix.
 */

// Registry and process metrics
export { enableDefaultMetrics, registry, startTime } from './registry'

export * from './pool'
