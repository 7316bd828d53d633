import { readFileSync, readdirSync, statSync } from 'node:fs'
import { basename, extname, join } from 'node:path'
import type {
  PoolPreset,
  PresetConfig,
  PresetGroup,
  ResourceTemplate,
  ValidationError,
} from '@reservoir/core'
import { safeParsePresetGroup } from '@reservoir/core'
import { parse as parseYaml } from 'yaml'
import type { Logger } from '../logger'
import { PrototypeTemplate, TemplateCatalog } from '../template'

/**
 * Interpolate environment variables in a string
 * Supports ${VAR} syntax, only replaces if the variable is set
 */
export function interpolateEnvVars(
  content: string,
  env: Record<string, string | undefined> = process.env,
): string {
  return content.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
    const value = env[varName]
    return value === undefined ? match : value
  })
}

/**
 * Preset file validation error
 */
export class PresetValidationError extends Error {
  readonly code = 'PRESET_INVALID'

  constructor(
    public readonly file: string,
    public readonly errors: ValidationError[],
  ) {
    const errorList = errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    super(`Invalid preset file ${file}:\n${errorList}`)
    this.name = 'PresetValidationError'
  }
}

export interface PresetLoadOptions {
  /** Templates referenced by name from preset files */
  catalog?: TemplateCatalog
  logger?: Logger
  env?: Record<string, string | undefined>
}

/**
 * Resolve the template a preset entry points at.
 *
 * A named catalog template wins over an inline prototype. A preset with
 * neither, or naming a template the catalog lacks, resolves to null.
 */
export function resolveTemplate(
  entry: PresetConfig,
  catalog: TemplateCatalog,
): ResourceTemplate | null {
  if (entry.template !== undefined) {
    return catalog.get(entry.template) ?? null
  }
  if (entry.prototype !== undefined) {
    return new PrototypeTemplate(entry.tag, entry.prototype)
  }
  return null
}

function isPresetFile(file: string): boolean {
  return file.endsWith('.yaml') || file.endsWith('.yml')
}

/**
 * Load and validate a single preset YAML file into a preset group
 */
export function loadPresetFile(filePath: string, options: PresetLoadOptions = {}): PresetGroup {
  const catalog = options.catalog ?? new TemplateCatalog()
  const content = readFileSync(filePath, 'utf-8')

  let raw: unknown
  try {
    raw = parseYaml(interpolateEnvVars(content, options.env))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new PresetValidationError(filePath, [{ path: '/', message }])
  }

  const result = safeParsePresetGroup(raw)
  if (!result.success) {
    throw new PresetValidationError(filePath, result.errors)
  }

  const name = result.data.name ?? basename(filePath, extname(filePath))
  const presets: PoolPreset[] = result.data.presets.map((entry) => {
    const template = resolveTemplate(entry, catalog)
    if (!template) {
      options.logger?.warn(
        { file: filePath, tag: entry.tag, template: entry.template },
        'Preset has no resolvable template and will be skipped',
      )
    } else if (template.tag !== entry.tag) {
      options.logger?.warn(
        { file: filePath, tag: entry.tag, templateTag: template.tag },
        'Preset tag differs from its template tag; the template tag is used for matching',
      )
    }
    return {
      template,
      tag: entry.tag,
      initialCount: entry.initialCount,
      expandable: entry.expandable,
    }
  })

  return { name, presets }
}

/**
 * Load all preset YAML files from a directory, ordered by file name
 */
export function loadPresetsFromDir(dirPath: string, options: PresetLoadOptions = {}): PresetGroup[] {
  let files: string[]
  try {
    files = readdirSync(dirPath)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      options.logger?.warn({ dir: dirPath }, 'Preset directory not found')
      return []
    }
    throw error
  }

  const groups: PresetGroup[] = []
  for (const file of files.filter(isPresetFile).sort()) {
    const filePath = join(dirPath, file)
    if (!statSync(filePath).isFile()) continue
    groups.push(loadPresetFile(filePath, options))
  }

  return groups
}
