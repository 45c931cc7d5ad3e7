import type { Finding } from './finding.js'

/**
 * Terminal status of one adapter execution
 */
export type ScanStatus = 'succeeded' | 'failed' | 'timed_out' | 'skipped'

/**
 * Error classification carried by a non-successful result
 */
export type ScanErrorKind = 'invocation' | 'timeout' | 'parse' | 'transient' | 'cancelled'

/**
 * Tail of the captured process output, kept for debugging
 */
export interface ScanDiagnostics {
  stdout: string
  stderr: string
}

export interface ScanError {
  kind: ScanErrorKind
  message: string
}

/**
 * Record of one adapter's execution
 */
export interface ScanResult {
  scannerId: string
  status: ScanStatus

  /** Raw exit code of the underlying process, null when there was none */
  exitCode: number | null

  /** Wall-clock duration in milliseconds, across all attempts */
  duration: number

  /** Number of attempts made, including retries */
  attempts: number

  /**
   * Findings in the scanner's native output order. Empty unless succeeded,
   * except parse failures which keep what was parsed before the error.
   */
  findings: Finding[]

  error?: ScanError

  diagnostics?: ScanDiagnostics
}
