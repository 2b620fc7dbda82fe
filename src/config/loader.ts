import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { RowfileError, type FieldIssue } from '../errors/index.js'
import { RowfileConfigSchema, type RowfileConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends RowfileError {
  public readonly fields: FieldIssue[]

  constructor(message: string, fields: FieldIssue[] = []) {
    super('CONFIG_INVALID', message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

/** The one environment variable read: overrides storage.path. */
export const STORAGE_PATH_ENV = 'ROWFILE_STORAGE_PATH'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Load, validate, and return a frozen RowfileConfig.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply ROWFILE_STORAGE_PATH
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to rowfile.config.json
 * @returns Frozen, validated RowfileConfig
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string): RowfileConfig {
  // 1. Read file
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  // 2. Parse JSON
  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isRecord(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  // 3. Merge with defaults (deep clone so defaults are never shared)
  const config = deepMerge(structuredClone(DEFAULT_CONFIG), userConfig)

  // 4. Apply the storage path override
  const envPath = process.env[STORAGE_PATH_ENV]
  if (envPath !== undefined && envPath !== '' && isRecord(config.storage)) {
    config.storage = { ...config.storage, path: envPath }
  }

  // 5. Validate with TypeBox
  if (!Value.Check(RowfileConfigSchema, config)) {
    const fields = [...Value.Errors(RowfileConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  // 6. Freeze and return
  return deepFreeze(config)
}
