// Core types - shared across all packages
export * from './types'

// Resource template interface - implemented by host templates
export * from './template'

// Schemas for preset file validation
export * from './schemas/preset'
