import type { Finding, ScanDiagnostics, ScanErrorKind } from '../types/index.js'

export interface AdapterErrorDetails {
  exitCode?: number | null
  diagnostics?: ScanDiagnostics
  cause?: unknown
}

/**
 * Base class for errors raised while running one scanner adapter.
 * These never escape the orchestrator: they are folded into a ScanResult.
 */
export abstract class AdapterError extends Error {
  abstract readonly kind: ScanErrorKind
  readonly exitCode: number | null
  readonly diagnostics?: ScanDiagnostics

  constructor(
    public readonly scannerId: string,
    message: string,
    details: AdapterErrorDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause })
    this.exitCode = details.exitCode ?? null
    this.diagnostics = details.diagnostics
  }
}

/**
 * Binary missing, service unreachable, crash exit code or rejected credentials
 */
export class AdapterInvocationError extends AdapterError {
  readonly kind = 'invocation' as const

  constructor(scannerId: string, message: string, details?: AdapterErrorDetails) {
    super(scannerId, message, details)
    this.name = 'AdapterInvocationError'
  }
}

/**
 * The adapter did not finish within its time budget. Never retried.
 */
export class AdapterTimeoutError extends AdapterError {
  readonly kind = 'timeout' as const

  constructor(
    scannerId: string,
    public readonly timeoutMs: number,
    details?: AdapterErrorDetails
  ) {
    super(scannerId, `Timed out after ${timeoutMs}ms`, details)
    this.name = 'AdapterTimeoutError'
  }
}

/**
 * Native output could not be parsed. Never retried; keeps the findings
 * parsed before the error.
 */
export class AdapterParseError extends AdapterError {
  readonly kind = 'parse' as const

  constructor(
    scannerId: string,
    message: string,
    public readonly partial: readonly Finding[] = [],
    details?: AdapterErrorDetails
  ) {
    super(scannerId, message, details)
    this.name = 'AdapterParseError'
  }
}

/**
 * A condition expected to clear on retry, such as a dropped connection
 */
export class AdapterTransientError extends AdapterError {
  readonly kind = 'transient' as const

  constructor(scannerId: string, message: string, details?: AdapterErrorDetails) {
    super(scannerId, message, details)
    this.name = 'AdapterTransientError'
  }
}

/**
 * The adapter was terminated because its run was cancelled
 */
export class AdapterCancelledError extends AdapterError {
  readonly kind = 'cancelled' as const

  constructor(scannerId: string, message: string, details?: AdapterErrorDetails) {
    super(scannerId, message, details)
    this.name = 'AdapterCancelledError'
  }
}

export type CancellationKind = 'global-timeout' | 'fail-fast' | 'external'

/**
 * Abort reason used by the orchestrator when it cancels outstanding adapters
 */
export class PipelineCancelledError extends Error {
  constructor(
    public readonly cancellation: CancellationKind,
    message: string
  ) {
    super(message)
    this.name = 'PipelineCancelledError'
  }
}

/**
 * Invalid configuration. Raised before any adapter runs and aborts the run.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    public readonly configPath?: string
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message)
    this.name = 'ConfigurationError'
  }
}

/**
 * `code` of a Node system error, such as ENOENT or ESRCH
 */
export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined
}
