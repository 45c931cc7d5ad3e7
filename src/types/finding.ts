/**
 * Severity levels for security findings, most severe first
 */
export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info'

/**
 * Scanner families an adapter can belong to
 */
export type ScannerFamily =
  | 'lint'
  | 'filesystem-vuln'
  | 'dependency-vuln'
  | 'quality-server'

/**
 * Location information for a finding, relative to the scan target
 */
export interface FindingLocation {
  file: string
  line?: number
  column?: number
  endLine?: number
  endColumn?: number
}

/**
 * Package coordinate for dependency-level findings
 */
export interface PackageCoordinate {
  name: string
  version: string
  ecosystem?: string
  /** Manifest or lock file the package was resolved from */
  manifest?: string
}

/**
 * A single normalized finding reported by one scanner
 */
export interface Finding {
  /** Adapter that produced this finding */
  scannerId: string

  /** Scanner-native rule or check identifier */
  ruleId: string

  /** Rule category used for cross-scanner fingerprinting */
  category: string

  /** Unified severity */
  severity: Severity

  /** Source location, absent for dependency-level findings */
  location?: FindingLocation

  /** Package coordinate, present for dependency-level findings */
  package?: PackageCoordinate

  /** Scanner-native message */
  message: string

  /** Dedup key; null when the finding has neither location nor package */
  fingerprint: string | null

  /** Native record as emitted by the scanner */
  raw: unknown
}

/**
 * Counts by severity
 */
export interface FindingSummary {
  critical: number
  high: number
  medium: number
  low: number
  info: number
}
