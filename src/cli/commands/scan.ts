/**
 * Scan command implementation
 *
 * Config → Registry → Orchestrator (parallel scanners) → Normalizer → Verdict → Reporter
 */

import { dirname, resolve } from 'path'
import { InvalidArgumentError, Option, type Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger, finding as logFinding, progress } from '../../utils/logger.js'
import { ConfigLoader } from '../../core/config/loader.js'
import { applyOverrides } from '../../core/config/overrides.js'
import { SeveritySchema, type Config } from '../../core/config/schema.js'
import { ConfigurationError } from '../../core/errors.js'
import { runPipeline, type PipelineRun } from '../../core/pipeline/index.js'
import { createReporter, isReportFormat, REPORT_FORMATS } from '../../core/reporter/index.js'
import { describeTarget } from '../../core/verdict/index.js'

const logger = createLogger('scan')

/**
 * Scan command options
 */
export interface ScanOptions {
  output?: string
  format?: string
  failOn?: string
  required?: string[]
  enable?: string[]
  disable?: string[]
  maxParallel?: number
  timeout?: number
  globalTimeout?: number
  retries?: number
  failFast?: boolean
}

/**
 * Parse a non-negative integer option
 */
export function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value)
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return parsed
}

/**
 * Parse a comma-separated list option
 */
export function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(Boolean)
}

/**
 * Load the configuration file, or the bundled default
 */
export async function loadConfiguration(configPath?: string): Promise<Config> {
  const loader = new ConfigLoader()
  return configPath ? loader.load(configPath) : loader.loadDefault()
}

/**
 * Target directory: the argument, else the configured target relative to the
 * configuration file (or the working directory for the bundled default)
 */
export function resolveTarget(target: string | undefined, config: Config, configPath?: string): string {
  if (target) {
    return resolve(target)
  }
  const base = configPath ? dirname(resolve(configPath)) : process.cwd()
  return resolve(base, config.target)
}

/**
 * Execute scan command
 */
export async function executeScan(
  target: string | undefined,
  options: ScanOptions,
  globalOptions: GlobalOptions
): Promise<number> {
  const format = options.format ?? 'json'
  const controller = new AbortController()
  const onInterrupt = () => controller.abort()

  try {
    if (!isReportFormat(format)) {
      throw new ConfigurationError(`Unknown report format "${format}"; expected one of ${REPORT_FORMATS.join(', ')}`)
    }

    let failOn: Config['gating']['severity'] | undefined
    if (options.failOn !== undefined) {
      const parsed = SeveritySchema.safeParse(options.failOn.toLowerCase())
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid gating severity "${options.failOn}"`)
      }
      failOn = parsed.data
    }

    const config = applyOverrides(await loadConfiguration(globalOptions.config), {
      failOn,
      required: options.required,
      maxParallelism: options.maxParallel,
      adapterTimeoutMs: options.timeout,
      globalTimeoutMs: options.globalTimeout,
      retries: options.retries,
      failFast: options.failFast
    })
    const targetPath = resolveTarget(target, config, globalOptions.config)

    process.once('SIGINT', onInterrupt)
    const spinner = progress(`Scanning ${targetPath}`)
    let run: PipelineRun
    try {
      run = await runPipeline(config, targetPath, {
        activation: { enable: options.enable, disable: options.disable },
        signal: controller.signal
      })
    } finally {
      spinner.stop()
    }
    const { verdict } = run

    await createReporter(format).write(verdict, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    for (const group of verdict.groups) {
      logFinding(group.severity, `${group.category} (${group.scanners.join(', ')})`, describeTarget(group))
    }
    for (const warning of verdict.warnings) {
      logger.warn(warning)
    }
    logger.info(verdict.summary)
    for (const reason of verdict.reasons) {
      logger.info(`  - ${reason}`)
    }
    if (options.output) {
      logger.info(`Report written to ${options.output}`)
    }

    return verdict.exitCode
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`)
    } else {
      const message = error instanceof Error ? error.message : 'Unknown error'
      logger.error(`Scan failed: ${message}`)
    }
    return ExitCode.ERROR
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }
}

/**
 * Register scan command on the program
 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan [target]')
    .description('Scan a directory with every enabled scanner')
    .option('-o, --output <file>', 'Output file path')
    .addOption(
      new Option('-f, --format <format>', 'Output format')
        .choices([...REPORT_FORMATS])
        .default('json')
    )
    .option('--fail-on <severity>', 'Gating severity (critical|high|medium|low|info)')
    .option('--required <ids>', 'Comma-separated required scanners', parseList)
    .option('--enable <ids>', 'Comma-separated scanners to enable for this run', parseList)
    .option('--disable <ids>', 'Comma-separated scanners to disable for this run', parseList)
    .option('--max-parallel <n>', 'Scanners running at once (0 = all)', parseInteger)
    .option('--timeout <ms>', 'Per-scanner timeout in milliseconds', parsePositiveInteger)
    .option('--global-timeout <ms>', 'Timeout for the whole run in milliseconds', parsePositiveInteger)
    .option('--retries <n>', 'Retries for transient scanner failures', parseInteger)
    .option('--fail-fast', 'Cancel remaining scanners when a required scanner fails')
    .action(async (target: string | undefined, options: ScanOptions) => {
      const exitCode = await executeScan(target, options, program.opts<GlobalOptions>())
      process.exit(exitCode)
    })
}
