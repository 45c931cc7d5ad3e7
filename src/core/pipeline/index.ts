import { resolve } from 'path'
import type { ScanResult, Verdict } from '../../types/index.js'
import { isDirectory } from '../../utils/hash.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { Config } from '../config/schema.js'
import { ConfigurationError } from '../errors.js'
import { normalize } from '../normalizer/index.js'
import { Orchestrator } from '../orchestrator/index.js'
import { createRegistry, type ActivationOverrides, type ScannerRegistry } from '../registry/index.js'
import { VerdictBuilder } from '../verdict/index.js'

export interface PipelineOptions {
  /** Defaults to a registry built from the configuration */
  registry?: ScannerRegistry
  activation?: ActivationOverrides
  signal?: AbortSignal
  abortGraceMs?: number
  logger?: Logger
}

export interface PipelineRun {
  verdict: Verdict
  results: ScanResult[]
}

/**
 * One end-to-end run: Registry → Orchestrator → Normalization → Verdict.
 * Configuration problems raise ConfigurationError before any scanner starts.
 */
export async function runPipeline(
  config: Config,
  target: string,
  options: PipelineOptions = {}
): Promise<PipelineRun> {
  const logger = options.logger ?? createLogger('pipeline')
  const targetPath = resolve(target)

  if (!(await isDirectory(targetPath))) {
    throw new ConfigurationError(`Scan target is not a directory: ${targetPath}`)
  }

  const registry = options.registry ?? createRegistry(config)
  const adapters = registry.active(options.activation)
  if (adapters.length === 0) {
    throw new ConfigurationError('No scanners enabled')
  }

  const activeIds = new Set(adapters.map(adapter => adapter.id))
  const inactiveRequired = config.required.filter(id => !activeIds.has(id))
  if (inactiveRequired.length > 0) {
    throw new ConfigurationError(
      'Required scanners are not enabled for this run',
      inactiveRequired.map(id => `required: "${id}" is ${registry.has(id) ? 'disabled' : 'not configured'}`)
    )
  }

  logger.info(`Scanning ${targetPath} with ${adapters.map(adapter => adapter.id).join(', ')}`)

  const timeouts: Record<string, number> = {}
  for (const [id, scanner] of Object.entries(config.scanners)) {
    if (scanner.timeout_ms !== undefined) {
      timeouts[id] = scanner.timeout_ms
    }
  }

  const orchestrator = new Orchestrator({
    maxParallelism: config.orchestration.max_parallelism,
    adapterTimeoutMs: config.orchestration.adapter_timeout_ms,
    timeouts,
    globalTimeoutMs: config.orchestration.global_timeout_ms,
    retries: config.orchestration.retries,
    retryDelayMs: config.orchestration.retry_delay_ms,
    failFast: config.orchestration.fail_fast,
    required: config.required,
    abortGraceMs: options.abortGraceMs,
    logger: options.logger
  })

  const orchestration = await orchestrator.run(targetPath, adapters, options.signal)
  const normalization = normalize(orchestration.results, { exceptions: config.exceptions })

  for (const warning of normalization.warnings) {
    logger.warn(warning)
  }

  const verdict = new VerdictBuilder(
    {
      severity: config.gating.severity,
      failOnRequiredScannerFailure: config.gating.fail_on_required_scanner_failure
    },
    config.required
  ).build({
    normalization,
    results: orchestration.results,
    target: targetPath,
    duration: orchestration.duration,
    cancelled: orchestration.cancelled
  })

  logger.debug(verdict.summary)
  return { verdict, results: orchestration.results }
}
