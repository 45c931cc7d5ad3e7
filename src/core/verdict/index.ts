import type {
  DedupGroup,
  Finding,
  ScannerSummary,
  ScanResult,
  Severity,
  Verdict,
  VerdictExitCode
} from '../../types/index.js'
import { compareSeverity, isAtLeast, summarize } from '../../utils/severity.js'
import type { CancellationKind } from '../errors.js'
import type { NormalizationResult } from '../normalizer/index.js'

/**
 * Exit codes for CLI
 */
export const ExitCodes = {
  passed: 0,
  gateBreached: 1,
  infrastructure: 2
} as const satisfies Record<string, VerdictExitCode>

export interface GatingOptions {
  /** Findings at or above this severity fail the gate */
  severity: Severity
  /** Whether a required scanner that did not succeed fails the run */
  failOnRequiredScannerFailure: boolean
}

export interface VerdictInput {
  normalization: NormalizationResult
  results: readonly ScanResult[]
  target: string
  duration?: number
  cancelled?: CancellationKind | null
}

/**
 * Severity descending, then fingerprint ascending
 */
export function sortGroups(groups: readonly DedupGroup[]): DedupGroup[] {
  return [...groups].sort((a, b) => {
    const bySeverity = compareSeverity(b.severity, a.severity)
    if (bySeverity !== 0) return bySeverity
    if (a.fingerprint === b.fingerprint) return 0
    return a.fingerprint < b.fingerprint ? -1 : 1
  })
}

/**
 * Where a group or finding points, for human-readable output
 */
export function describeTarget(item: Pick<Finding, 'location' | 'package'>): string {
  if (item.package) {
    return `${item.package.name}@${item.package.version}`
  }
  if (item.location) {
    return item.location.line ? `${item.location.file}:${item.location.line}` : item.location.file
  }
  return 'unknown location'
}

export class VerdictBuilder {
  private readonly required: ReadonlySet<string>

  constructor(
    private readonly gating: GatingOptions,
    required: readonly string[]
  ) {
    this.required = new Set(required)
  }

  /**
   * Combine normalized findings and scanner outcomes into the run's verdict.
   * No side effects; the verdict is frozen.
   */
  build(input: VerdictInput): Verdict {
    const { normalization, results } = input
    const groups = sortGroups(normalization.groups)
    const threshold = this.gating.severity

    const breachingGroups = groups.filter(group => isAtLeast(group.severity, threshold))
    const breachingUngrouped = normalization.ungrouped.filter(finding => isAtLeast(finding.severity, threshold))
    const gateBreached = breachingGroups.length > 0 || breachingUngrouped.length > 0

    const failedRequired = results.filter(
      result => this.required.has(result.scannerId) && result.status !== 'succeeded'
    )
    const requiredScannerFailed = failedRequired.length > 0
    // A run cut short by the caller or by fail-fast did not finish scanning
    const interrupted = input.cancelled === 'external' || input.cancelled === 'fail-fast'
    const infrastructureFailure =
      (requiredScannerFailed && this.gating.failOnRequiredScannerFailure) || interrupted

    const exitCode: VerdictExitCode = infrastructureFailure
      ? ExitCodes.infrastructure
      : gateBreached ? ExitCodes.gateBreached : ExitCodes.passed

    const scanners = this.summarizeScanners(results)

    const reasons: string[] = []
    for (const result of failedRequired) {
      reasons.push(
        `Required scanner "${result.scannerId}" ${result.status}${result.error ? `: ${result.error.message}` : ''}`
      )
    }
    if (input.cancelled) {
      reasons.push(`Run cancelled (${input.cancelled})`)
    }
    for (const group of breachingGroups) {
      reasons.push(
        `${group.severity.toUpperCase()}: ${group.category} at ${describeTarget(group)} (${group.scanners.join(', ')})`
      )
    }
    for (const finding of breachingUngrouped) {
      reasons.push(`${finding.severity.toUpperCase()}: ${finding.ruleId} (${finding.scannerId}, no location)`)
    }
    if (normalization.suppressed.length > 0) {
      reasons.push(`${normalization.suppressed.length} finding(s) suppressed by exceptions`)
    }

    const warnings = [...normalization.warnings]
    for (const result of results) {
      if (!this.required.has(result.scannerId) && result.status !== 'succeeded') {
        warnings.push(
          `Scanner "${result.scannerId}" ${result.status}${result.error ? `: ${result.error.message}` : ''}`
        )
      }
    }

    const totals = {
      bySeverity: summarize([...groups, ...normalization.ungrouped]),
      byScanner: Object.fromEntries(results.map(result => [result.scannerId, result.findings.length])),
      groups: groups.length,
      ungrouped: normalization.ungrouped.length,
      suppressed: normalization.suppressed.length
    }

    return Object.freeze({
      passed: exitCode === ExitCodes.passed,
      exitCode,
      gatingSeverity: threshold,
      groups: Object.freeze(groups),
      ungrouped: Object.freeze([...normalization.ungrouped]),
      suppressed: Object.freeze([...normalization.suppressed]),
      scanners: Object.freeze(scanners),
      totals: Object.freeze(totals),
      gateBreached,
      requiredScannerFailed,
      reasons: Object.freeze(reasons),
      warnings: Object.freeze(warnings),
      summary: this.buildSummary(exitCode, {
        breaching: breachingGroups.length + breachingUngrouped.length,
        failedRequired,
        cancelled: input.cancelled ?? null,
        groupCount: groups.length,
        scannerCount: results.length
      }),
      target: input.target,
      timestamp: new Date().toISOString(),
      duration: input.duration ?? 0
    })
  }

  private summarizeScanners(results: readonly ScanResult[]): ScannerSummary[] {
    return [...results]
      .sort((a, b) => (a.scannerId < b.scannerId ? -1 : a.scannerId > b.scannerId ? 1 : 0))
      .map(result => ({
        scannerId: result.scannerId,
        status: result.status,
        required: this.required.has(result.scannerId),
        exitCode: result.exitCode,
        duration: result.duration,
        attempts: result.attempts,
        findingCount: result.findings.length,
        error: result.error
      }))
  }

  private buildSummary(
    exitCode: VerdictExitCode,
    counts: {
      breaching: number
      failedRequired: readonly ScanResult[]
      cancelled: CancellationKind | null
      groupCount: number
      scannerCount: number
    }
  ): string {
    const { breaching, failedRequired, cancelled, groupCount, scannerCount } = counts
    const threshold = this.gating.severity.toUpperCase()

    if (exitCode === ExitCodes.infrastructure) {
      if (failedRequired.length === 0 || !this.gating.failOnRequiredScannerFailure) {
        return `ERROR: run cancelled (${cancelled ?? 'unknown'}) before every scanner finished`
      }
      const ids = failedRequired.map(result => result.scannerId).join(', ')
      return `ERROR: required scanner(s) did not succeed: ${ids}`
    }
    if (exitCode === ExitCodes.gateBreached) {
      return `FAILED: ${breaching} finding group(s) at or above ${threshold}`
    }
    if (groupCount === 0) {
      return `PASSED: No findings from ${scannerCount} scanner(s)`
    }
    return `PASSED: ${groupCount} finding group(s), none at or above ${threshold}`
  }
}

/**
 * Create a verdict builder
 */
export function createVerdictBuilder(gating: GatingOptions, required: readonly string[]): VerdictBuilder {
  return new VerdictBuilder(gating, required)
}

/**
 * One-shot form of VerdictBuilder#build
 */
export function buildVerdict(
  input: VerdictInput & { gating: GatingOptions; required?: readonly string[] }
): Verdict {
  const { gating, required = [], ...rest } = input
  return new VerdictBuilder(gating, required).build(rest)
}
