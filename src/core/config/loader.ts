import { readFile } from 'fs/promises'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { ConfigurationError, errorCode } from '../errors.js'
import {
  type Config,
  formatValidationErrors,
  validateConfigSafe,
  validateConfigSemantics
} from './schema.js'

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

type RawConfig = Record<string, unknown>

/** Sections merged key by key when a configuration extends another */
const MERGED_SECTIONS = ['gating', 'orchestration', 'severity_maps', 'categories'] as const

/** Configuration bundled with the package; `extends: default` refers to it */
export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../../config/default.yaml', import.meta.url))

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asRecord(value: unknown): RawConfig {
  return isRecord(value) ? value : {}
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

/**
 * Merge an extending document over its base, before validation
 */
export function mergeRawConfig(base: RawConfig, override: RawConfig): RawConfig {
  const merged: RawConfig = { ...base, ...override }

  for (const section of MERGED_SECTIONS) {
    if (section in base || section in override) {
      merged[section] = { ...asRecord(base[section]), ...asRecord(override[section]) }
    }
  }

  const baseScanners = asRecord(base.scanners)
  const overrideScanners = asRecord(override.scanners)
  const scanners: RawConfig = { ...baseScanners }
  for (const [id, entry] of Object.entries(overrideScanners)) {
    scanners[id] = { ...asRecord(baseScanners[id]), ...asRecord(entry) }
  }
  merged.scanners = scanners

  merged.required = [...new Set([...asArray(base.required), ...asArray(override.required)])]
  merged.exceptions = [...asArray(base.exceptions), ...asArray(override.exceptions)]

  return merged
}

export class ConfigLoader {
  private cache = new Map<string, Config>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load configuration from file path
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)

    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    const raw = await this.loadRaw(absolutePath, [])
    const config = this.check(raw, absolutePath)

    this.cache.set(absolutePath, config)
    return config
  }

  /**
   * Load the configuration bundled with the package
   */
  async loadDefault(): Promise<Config> {
    return this.load(DEFAULT_CONFIG_PATH)
  }

  /**
   * Load configuration from string content; `extends` is not followed
   */
  loadFromString(content: string): Config {
    return this.check(this.parseYaml(content, '<string>'), undefined)
  }

  /**
   * Validate a configuration file without caching it
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const absolutePath = resolve(this.basePath, configPath)
      this.check(await this.loadRaw(absolutePath, []), absolutePath)
      return { valid: true, errors: [] }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          valid: false,
          errors: error.issues.length > 0 ? [...error.issues] : [error.message]
        }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  private check(raw: RawConfig, configPath: string | undefined): Config {
    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      throw new ConfigurationError(
        `Invalid configuration${configPath ? `: ${configPath}` : ''}`,
        formatValidationErrors(validation.errors),
        configPath
      )
    }

    const issues = validateConfigSemantics(validation.data)
    if (issues.length > 0) {
      throw new ConfigurationError(
        `Invalid configuration${configPath ? `: ${configPath}` : ''}`,
        issues,
        configPath
      )
    }

    return validation.data
  }

  private async loadRaw(absolutePath: string, chain: readonly string[]): Promise<RawConfig> {
    if (chain.includes(absolutePath)) {
      throw new ConfigurationError(
        'Circular extends',
        [...chain, absolutePath],
        absolutePath
      )
    }

    const raw = this.parseYaml(await this.readConfigFile(absolutePath), absolutePath)

    if (this.allowExtends && typeof raw.extends === 'string') {
      const basePath = raw.extends === 'default'
        ? DEFAULT_CONFIG_PATH
        : resolve(dirname(absolutePath), raw.extends)
      const base = await this.loadRaw(basePath, [...chain, absolutePath])
      return mergeRawConfig(base, raw)
    }

    return raw
  }

  private parseYaml(content: string, source: string): RawConfig {
    let data: unknown
    try {
      data = yaml.load(content)
    } catch (error) {
      throw new ConfigurationError(
        `Invalid YAML in ${source}`,
        [error instanceof Error ? error.message : String(error)],
        source
      )
    }

    if (!isRecord(data)) {
      throw new ConfigurationError(`Configuration must be a YAML mapping: ${source}`, [], source)
    }
    return data
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = errorCode(error) ?? 'UNKNOWN'
      throw new ConfigurationError(
        `Failed to read configuration file: ${absolutePath}`,
        [code],
        absolutePath
      )
    }
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
