/**
 * scanners command - List configured scanners
 */

import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { createRegistry } from '../../core/registry/index.js'
import { loadConfiguration } from './scan.js'

const logger = createLogger('scanners')

/**
 * One line per configured scanner: id, type, enabled and required flags
 */
export async function listScanners(globalOptions: GlobalOptions): Promise<number> {
  try {
    const config = await loadConfiguration(globalOptions.config)
    const registry = createRegistry(config)
    const required = new Set(config.required)

    const rows = registry.entries().map(entry => [
      entry.id,
      entry.type,
      entry.enabled ? 'enabled' : 'disabled',
      required.has(entry.id) ? 'required' : ''
    ])
    const widths = [0, 1, 2].map(column => Math.max(...rows.map(row => row[column]?.length ?? 0)))

    for (const row of rows) {
      const line = row
        .map((value, column) => value.padEnd(widths[column] ?? 0))
        .join('  ')
        .trimEnd()
      process.stdout.write(line + '\n')
    }

    return ExitCode.PASSED
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`Failed to list scanners: ${message}`)
    return ExitCode.ERROR
  }
}
