/**
 * Domain Error Types
 *
 * Raised only for setup and contract violations. Routine outcomes such as an
 * unknown tag or an exhausted pool are return values, never errors.
 */

export class DuplicateResourceError extends Error {
  readonly code = 'DUPLICATE_RESOURCE'

  constructor(tag: string) {
    super(`Template for tag ${tag} returned a resource that is already pooled`)
    this.name = 'DuplicateResourceError'
  }
}

export class TemplateConflictError extends Error {
  readonly code = 'TEMPLATE_CONFLICT'

  constructor(name: string) {
    super(`Template ${name} is already registered`)
    this.name = 'TemplateConflictError'
  }
}

/**
 * Type guard for domain errors with a stable code.
 */
export function isPoolError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}
