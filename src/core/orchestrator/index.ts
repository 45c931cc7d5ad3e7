import type { ScanResult } from '../../types/index.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { sleep } from '../../utils/signal.js'
import { executeAdapter, type ScannerAdapter } from '../adapter/base.js'
import { PipelineCancelledError, type CancellationKind } from '../errors.js'

export interface OrchestratorOptions {
  /** Adapters running at once; 0 runs all of them together */
  maxParallelism: number
  /** Per-attempt timeout */
  adapterTimeoutMs: number
  /** Per-scanner timeout overrides */
  timeouts?: Readonly<Record<string, number>>
  /** Upper bound on the whole run */
  globalTimeoutMs: number
  /** Extra attempts for transient failures */
  retries: number
  retryDelayMs: number
  /** Cancel outstanding adapters once a required scanner fails */
  failFast: boolean
  required: readonly string[]
  /** How long an aborted adapter may take to wind down */
  abortGraceMs?: number
  logger?: Logger
}

export interface OrchestrationResult {
  /** One result per adapter, ordered by scanner id */
  results: ScanResult[]
  anyRequiredScannerFailed: boolean
  /** Why the run was cut short, if it was */
  cancelled: CancellationKind | null
  duration: number
}

function byScannerId(a: ScanResult, b: ScanResult): number {
  if (a.scannerId === b.scannerId) return 0
  return a.scannerId < b.scannerId ? -1 : 1
}

/**
 * Runs adapters concurrently and joins their results at a barrier.
 *
 * The barrier is bounded: the global timeout aborts everything still running,
 * and every attempt settles within the abort grace period afterwards.
 */
export class Orchestrator {
  private readonly logger: Logger
  private readonly required: ReadonlySet<string>

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger ?? createLogger('orchestrator')
    this.required = new Set(options.required)
  }

  async run(
    targetPath: string,
    adapters: readonly ScannerAdapter[],
    signal?: AbortSignal
  ): Promise<OrchestrationResult> {
    const start = Date.now()
    const controller = new AbortController()
    const results: ScanResult[] = []

    const cancel = (kind: CancellationKind, message: string) => {
      if (!controller.signal.aborted) {
        this.logger.warn(message)
        controller.abort(new PipelineCancelledError(kind, message))
      }
    }

    const onExternalAbort = () => cancel('external', 'Run cancelled')
    if (signal?.aborted) {
      onExternalAbort()
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true })
    }

    const globalTimer = setTimeout(
      () => cancel('global-timeout', `Global timeout of ${this.options.globalTimeoutMs}ms exceeded`),
      this.options.globalTimeoutMs
    )

    const queue = [...adapters]
    const limit = this.options.maxParallelism > 0
      ? Math.min(this.options.maxParallelism, queue.length)
      : queue.length

    const workers = new Array(limit).fill(0).map(async () => {
      while (queue.length > 0) {
        const adapter = queue.shift()
        if (!adapter) break

        if (controller.signal.aborted) {
          results.push(this.notStarted(adapter, controller.signal))
          continue
        }

        const result = await this.runWithRetry(adapter, targetPath, controller.signal)
        results.push(result)
        this.logger.debug(`${adapter.id}: ${result.status} in ${result.duration}ms (${result.findings.length} findings)`)

        if (this.options.failFast && this.required.has(adapter.id) && result.status !== 'succeeded') {
          cancel('fail-fast', `Required scanner "${adapter.id}" ${result.status}; cancelling outstanding scanners`)
        }
      }
    })

    try {
      await Promise.all(workers)
    } finally {
      clearTimeout(globalTimer)
      signal?.removeEventListener('abort', onExternalAbort)
    }

    const reason: unknown = controller.signal.reason
    results.sort(byScannerId)

    return {
      results,
      anyRequiredScannerFailed: results.some(
        result => this.required.has(result.scannerId) && result.status !== 'succeeded'
      ),
      cancelled: reason instanceof PipelineCancelledError ? reason.cancellation : null,
      duration: Date.now() - start
    }
  }

  /**
   * Run one adapter, retrying transient failures with exponential backoff.
   * Each attempt gets the full per-adapter timeout.
   */
  private async runWithRetry(
    adapter: ScannerAdapter,
    targetPath: string,
    signal: AbortSignal
  ): Promise<ScanResult> {
    const start = Date.now()
    const timeoutMs = this.options.timeouts?.[adapter.id] ?? this.options.adapterTimeoutMs

    for (let attempt = 0; ; attempt++) {
      this.logger.info(`Running ${adapter.name} (${adapter.id})${attempt > 0 ? `, attempt ${attempt + 1}` : ''}`)

      const result = await executeAdapter(adapter, {
        targetPath,
        timeoutMs,
        signal,
        attempt,
        abortGraceMs: this.options.abortGraceMs
      })
      const settled: ScanResult = { ...result, attempts: attempt + 1, duration: Date.now() - start }

      const retryable = result.status === 'failed' && result.error?.kind === 'transient'
      if (!retryable || attempt >= this.options.retries || signal.aborted) {
        if (settled.error) {
          this.logger.warn(`${adapter.id} ${settled.status}: ${settled.error.message}`)
        }
        return settled
      }

      const delay = this.options.retryDelayMs * 2 ** attempt
      this.logger.warn(`${adapter.id} failed (${result.error?.message ?? 'transient error'}); retrying in ${delay}ms`)
      await sleep(delay, signal)
      if (signal.aborted) {
        return { ...settled, duration: Date.now() - start }
      }
    }
  }

  private notStarted(adapter: ScannerAdapter, signal: AbortSignal): ScanResult {
    const reason: unknown = signal.reason
    return {
      scannerId: adapter.id,
      status: 'skipped',
      exitCode: null,
      duration: 0,
      attempts: 0,
      findings: [],
      error: {
        kind: 'cancelled',
        message: reason instanceof Error ? `Not started: ${reason.message}` : 'Not started'
      }
    }
  }
}

/**
 * Create an orchestrator
 */
export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  return new Orchestrator(options)
}
