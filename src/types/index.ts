export type {
  Severity,
  ScannerFamily,
  FindingLocation,
  PackageCoordinate,
  Finding,
  FindingSummary
} from './finding.js'
export type {
  ScanStatus,
  ScanErrorKind,
  ScanDiagnostics,
  ScanError,
  ScanResult
} from './result.js'
export type {
  DedupGroup,
  ScannerSummary,
  VerdictTotals,
  VerdictExitCode,
  Verdict,
  ReportOptions
} from './report.js'
