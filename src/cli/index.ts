#!/usr/bin/env node
/**
 * scanweave CLI entry point
 *
 * Runs several security scanners against one target and gates on the
 * deduplicated findings.
 */

import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'
import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { createConfigLoader } from '../core/config/loader.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerScanCommand } from './commands/scan.js'
import { listScanners } from './commands/scanners.js'

/**
 * Exit codes for the CLI
 * - 0: passed
 * - 1: findings at or above the gating severity
 * - 2: orchestration, configuration or infrastructure error
 */
export const ExitCode = {
  PASSED: 0,
  FINDINGS: 1,
  ERROR: 2
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('scanweave')
    .description('Run security scanners in parallel and gate on their deduplicated findings')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: globalOpts.verbose ? 'debug' : 'info',
        quiet: globalOpts.quiet ?? false
      })
    })

  registerScanCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .option('--name <name>', 'Configuration name')
    .action(async (options: { output?: string; force?: boolean; name?: string }) => {
      const result = await initCommand({
        output: options.output,
        force: options.force,
        name: options.name
      })

      if (result.success) {
        logger.info(`Created configuration file: ${result.outputPath}`)
        process.exit(ExitCode.PASSED)
      } else {
        logger.error(`Failed to create configuration file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (config: string) => {
      const loader = createConfigLoader()
      const result = await loader.validate(config)

      if (result.valid) {
        logger.info(`✓ Configuration file is valid: ${config}`)
        process.exit(ExitCode.PASSED)
      } else {
        logger.error(`✗ Configuration file is invalid: ${config}`)
        for (const error of result.errors) {
          logger.error(`  - ${error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('scanners')
    .description('List configured scanners')
    .action(async () => {
      const exitCode = await listScanners(program.opts<GlobalOptions>())
      process.exit(exitCode)
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

// Run when executed directly, including through the npm bin symlink
function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) {
    return false
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false
  }
}

if (isMainModule()) {
  void run()
}
