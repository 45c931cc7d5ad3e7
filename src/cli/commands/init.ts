/**
 * init command - Generate a configuration file from the bundled default
 */

import * as fs from 'fs'
import * as path from 'path'
import { ConfigLoader, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js'
import { ConfigurationError } from '../../core/errors.js'

export const DEFAULT_OUTPUT_FILENAME = 'scanweave.config.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
  /** Replaces the `name` of the bundled default */
  name?: string
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Bundled default with its top-level `name` replaced, checked against the
 * schema so that a bad name is reported before anything is written
 */
export function renderConfig(template: string, name?: string): string {
  const content = name === undefined
    ? template
    : template.replace(/^name:.*$/m, `name: ${JSON.stringify(name)}`)

  new ConfigLoader().loadFromString(content)
  return content
}

/**
 * Execute the init command
 *
 * @param options - Command options
 * @returns Result of the operation
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(
    process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const content = renderConfig(fs.readFileSync(DEFAULT_CONFIG_PATH, 'utf-8'), options.name)

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, content, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    const message = error instanceof ConfigurationError && error.issues.length > 0
      ? error.issues.join('; ')
      : error instanceof Error ? error.message : 'Unknown error'
    return {
      success: false,
      outputPath,
      error: message
    }
  }
}
