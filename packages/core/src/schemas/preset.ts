import { z } from 'zod'

/**
 * Parse duration string (e.g., "30s", "5m", "1000ms") to milliseconds
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(ms|s|m|h)$/)
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}`)
  }
  const value = Number.parseInt(match[1], 10)
  const unit = match[2]
  switch (unit) {
    case 'ms':
      return value
    case 's':
      return value * 1000
    case 'm':
      return value * 60 * 1000
    case 'h':
      return value * 60 * 60 * 1000
    default:
      throw new Error(`Unknown duration unit: ${unit}`)
  }
}

/**
 * Format milliseconds to duration string
 */
export function formatDuration(ms: number): string {
  if (ms !== 0 && ms % (60 * 60 * 1000) === 0) return `${ms / (60 * 60 * 1000)}h`
  if (ms !== 0 && ms % (60 * 1000) === 0) return `${ms / (60 * 1000)}m`
  if (ms !== 0 && ms % 1000 === 0) return `${ms / 1000}s`
  return `${ms}ms`
}

// Tag pattern (lowercase alphanumeric with hyphens, dots or underscores)
const tagPattern = /^[a-z0-9][a-z0-9._-]*$/i
const poolTag = z
  .string()
  .regex(tagPattern, 'Must be alphanumeric with hyphens, dots or underscores')

// =============================================================================
// Preset Configuration (snake_case on disk)
// =============================================================================

/**
 * A single preset entry in a preset file
 */
export const presetConfigSchema = z
  .object({
    tag: poolTag.describe('Tag of the resources this preset pools'),
    template: z
      .string()
      .min(1)
      .optional()
      .describe('Name of a template registered in the host template catalog'),
    prototype: z
      .record(z.string(), z.unknown())
      .optional()
      .describe('Inline plain object cloned for every instance when no template is named'),
    initial_count: z
      .number()
      .int()
      .min(0)
      .default(0)
      .describe('Number of instances created at startup'),
    expandable: z
      .boolean()
      .default(false)
      .describe('Create additional instances on demand when the pool is exhausted'),
  })
  .transform((raw) => ({
    tag: raw.tag,
    template: raw.template,
    prototype: raw.prototype,
    initialCount: raw.initial_count,
    expandable: raw.expandable,
  }))

/**
 * A preset file: one ordered group of presets
 */
export const presetGroupSchema = z.object({
  name: z.string().min(1).optional().describe('Group name (defaults to the file name)'),
  presets: z.array(presetConfigSchema).default([]).describe('Presets in prewarm order'),
})

/**
 * Validated preset entry (camelCase), before its template is resolved
 */
export type PresetConfig = z.output<typeof presetConfigSchema>

/**
 * Validated preset file
 */
export type PresetGroupConfig = z.output<typeof presetGroupSchema>

// =============================================================================
// Validation utilities
// =============================================================================

/**
 * Validation error detail
 */
export interface ValidationError {
  path: string
  message: string
}

/**
 * Parse result type
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] }

/**
 * Parse and validate a preset file, throwing on invalid input
 */
export function parsePresetGroup(data: unknown): PresetGroupConfig {
  return presetGroupSchema.parse(data)
}

/**
 * Safely parse a preset file, returning result with errors
 */
export function safeParsePresetGroup(data: unknown): ParseResult<PresetGroupConfig> {
  const result = presetGroupSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const errors = result.error.issues.map((issue) => ({
    path: issue.path.join('.') || '/',
    message: issue.message,
  }))
  return { success: false, errors }
}
