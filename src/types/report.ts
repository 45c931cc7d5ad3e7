import type {
  Finding,
  FindingLocation,
  FindingSummary,
  PackageCoordinate,
  Severity
} from './finding.js'
import type { ScanErrorKind, ScanStatus } from './result.js'

/**
 * Findings collapsed under one fingerprint. Frozen once built.
 */
export interface DedupGroup {
  readonly fingerprint: string

  /** Maximum severity among members */
  readonly severity: Severity

  readonly category: string

  /** Distinct contributing scanner ids, sorted */
  readonly scanners: readonly string[]

  /** Distinct native rule ids, sorted */
  readonly ruleIds: readonly string[]

  /** Member findings in input order */
  readonly findings: readonly Finding[]

  readonly location?: FindingLocation
  readonly package?: PackageCoordinate
}

/**
 * Per-scanner summary carried by the verdict
 */
export interface ScannerSummary {
  scannerId: string
  status: ScanStatus
  required: boolean
  exitCode: number | null
  duration: number
  attempts: number
  findingCount: number
  error?: { kind: ScanErrorKind; message: string }
}

export interface VerdictTotals {
  /** Counts over dedup groups and ungrouped findings */
  bySeverity: FindingSummary

  /** Raw finding counts per scanner, before dedup */
  byScanner: Record<string, number>

  groups: number
  ungrouped: number
  suppressed: number
}

/**
 * Exit code convention of a pipeline run
 * - 0: passed
 * - 1: findings breached the gate
 * - 2: orchestration or infrastructure error
 */
export type VerdictExitCode = 0 | 1 | 2

/**
 * Final decision of one pipeline run
 */
export interface Verdict {
  readonly passed: boolean
  readonly exitCode: VerdictExitCode
  readonly gatingSeverity: Severity

  /** Sorted by severity descending, then fingerprint ascending */
  readonly groups: readonly DedupGroup[]

  /** Findings that could not be fingerprinted */
  readonly ungrouped: readonly Finding[]

  /** Findings removed by configured exceptions */
  readonly suppressed: readonly Finding[]

  /** Sorted by scanner id */
  readonly scanners: readonly ScannerSummary[]

  readonly totals: VerdictTotals
  readonly gateBreached: boolean
  readonly requiredScannerFailed: boolean
  readonly reasons: readonly string[]
  readonly warnings: readonly string[]
  readonly summary: string
  readonly target: string
  readonly timestamp: string
  readonly duration: number
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'json' | 'markdown' | 'sarif'
  output?: string
  quiet?: boolean
}
