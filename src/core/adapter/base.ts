import type {
  Finding,
  ScanDiagnostics,
  ScannerFamily,
  ScanResult,
  Severity
} from '../../types/index.js'
import {
  AdapterError,
  AdapterParseError,
  AdapterTimeoutError,
  PipelineCancelledError
} from '../errors.js'
import { linkAbort, settleWithin } from '../../utils/signal.js'
import { filterFindings } from './finding.js'

/**
 * Native severity vocabulary of one scanner mapped onto the unified scale
 */
export interface SeverityMap {
  values: Readonly<Record<string, Severity>>
  /** Used for native values missing from the table */
  fallback: Severity
}

/**
 * Declarative settings an adapter builds its invocation from
 */
export interface AdapterSettings {
  /** Executable name or path, for command-line scanners */
  binary?: string
  /** Findings below this severity are dropped */
  severityFloor: Severity
  /** Only keep findings whose file matches one of these globs (when non-empty) */
  include: readonly string[]
  /** Drop findings whose file matches one of these globs */
  exclude: readonly string[]
  /** Extra native arguments appended to the invocation */
  args: readonly string[]
  severityMap: SeverityMap
  /** Rule id to category overrides */
  categories: Readonly<Record<string, string>>
}

/**
 * Context handed to an adapter for one attempt
 */
export interface AdapterContext {
  /** Absolute path of the scan target; adapters must not modify it */
  targetPath: string
  /** Aborted on per-adapter timeout or pipeline cancellation */
  signal: AbortSignal
  /** Zero-based attempt number */
  attempt: number
}

export interface AdapterOutput {
  findings: Finding[]
  exitCode: number | null
  diagnostics?: ScanDiagnostics
}

/**
 * Contract every scanner adapter implements.
 *
 * Adapters own their invocation (command line or HTTP request) and their
 * parsing; they report failures by throwing the adapter error classes, which
 * `executeAdapter` folds into a ScanResult.
 */
export interface ScannerAdapter {
  readonly id: string
  readonly name: string
  readonly family: ScannerFamily
  readonly settings: AdapterSettings
  run(context: AdapterContext): Promise<AdapterOutput>
}

export interface ExecuteOptions {
  targetPath: string
  timeoutMs: number
  /** Pipeline-level cancellation */
  signal?: AbortSignal
  attempt?: number
  /** How long to wait for an adapter to wind down after abort */
  abortGraceMs?: number
}

const DEFAULT_ABORT_GRACE_MS = 5000

/**
 * Execute one adapter attempt with its timeout, never throwing.
 */
export async function executeAdapter(
  adapter: ScannerAdapter,
  options: ExecuteOptions
): Promise<ScanResult> {
  const start = Date.now()
  const controller = new AbortController()
  const unlink = linkAbort(options.signal, controller)
  const timer = setTimeout(
    () => controller.abort(new AdapterTimeoutError(adapter.id, options.timeoutMs)),
    options.timeoutMs
  )

  try {
    const output = await settleWithin(
      adapter.run({
        targetPath: options.targetPath,
        signal: controller.signal,
        attempt: options.attempt ?? 0
      }),
      controller.signal,
      options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS
    )
    return {
      scannerId: adapter.id,
      status: 'succeeded',
      exitCode: output.exitCode,
      duration: Date.now() - start,
      attempts: 1,
      findings: filterFindings(output.findings, adapter.settings),
      diagnostics: output.diagnostics
    }
  } catch (error) {
    return failureResult(adapter, error, controller.signal, Date.now() - start)
  } finally {
    clearTimeout(timer)
    unlink()
  }
}

function failureResult(
  adapter: ScannerAdapter,
  error: unknown,
  signal: AbortSignal,
  duration: number
): ScanResult {
  const adapterError = error instanceof AdapterError ? error : undefined
  const base = {
    scannerId: adapter.id,
    exitCode: adapterError?.exitCode ?? null,
    duration,
    attempts: 1,
    diagnostics: adapterError?.diagnostics
  }

  // An aborted attempt is described by why it was aborted, not by how it ended
  if (signal.aborted) {
    const reason: unknown = signal.reason
    if (
      reason instanceof AdapterTimeoutError ||
      (reason instanceof PipelineCancelledError && reason.cancellation === 'global-timeout')
    ) {
      return {
        ...base,
        status: 'timed_out',
        findings: [],
        error: { kind: 'timeout', message: reason.message }
      }
    }
    return {
      ...base,
      status: 'skipped',
      findings: [],
      error: {
        kind: 'cancelled',
        message: reason instanceof Error ? reason.message : 'Cancelled'
      }
    }
  }

  if (error instanceof AdapterParseError) {
    return {
      ...base,
      status: 'failed',
      findings: filterFindings([...error.partial], adapter.settings),
      error: { kind: 'parse', message: error.message }
    }
  }

  if (error instanceof AdapterTimeoutError) {
    return {
      ...base,
      status: 'timed_out',
      findings: [],
      error: { kind: 'timeout', message: error.message }
    }
  }

  return {
    ...base,
    status: 'failed',
    findings: [],
    error: {
      kind: adapterError?.kind ?? 'invocation',
      message: error instanceof Error ? error.message : String(error)
    }
  }
}
