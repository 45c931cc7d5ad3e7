import { isAbsolute, relative } from 'path'
import { minimatch } from 'minimatch'
import type { Finding, PackageCoordinate, Severity } from '../../types/index.js'
import { isAtLeast } from '../../utils/severity.js'
import { fingerprintFinding, normalizeFilePath } from '../normalizer/fingerprint.js'
import type { AdapterSettings, SeverityMap } from './base.js'

/**
 * Fields an adapter extracts from one native record
 */
export interface FindingInput {
  ruleId: string
  /** Native severity value, mapped through the scanner's severity map */
  severity: string
  message: string
  /** File as reported by the scanner, absolute or relative to the target */
  file?: string
  line?: number
  column?: number
  endLine?: number
  endColumn?: number
  package?: PackageCoordinate
  /** CWE reported by the scanner, as a number or `CWE-<n>` */
  cwe?: string | number
  /** Category the adapter derived itself, e.g. a canonical advisory id */
  category?: string
  raw: unknown
}

/**
 * Map a native severity value through the scanner's table
 */
export function mapSeverity(native: string, map: SeverityMap): Severity {
  const key = native.trim()
  return map.values[key] ?? map.values[key.toUpperCase()] ?? map.fallback
}

/**
 * Native levels whose mapped severity reaches `floor`, in the given order
 */
export function nativeLevelsAtOrAbove(
  levels: readonly string[],
  map: SeverityMap,
  floor: Severity
): string[] {
  return levels.filter(level => isAtLeast(mapSeverity(level, map), floor))
}

function normalizeCwe(cwe: string | number | undefined): string | undefined {
  if (cwe === undefined) {
    return undefined
  }
  const match = String(cwe).trim().match(/^(?:CWE-)?(\d+)$/i)
  return match ? `CWE-${match[1]}` : undefined
}

/**
 * Category precedence: configured override for the rule id, the adapter's
 * own category, a reported CWE, then the rule id itself.
 */
export function resolveCategory(
  ruleId: string,
  categories: Readonly<Record<string, string>>,
  explicit?: string,
  cwe?: string | number
): string {
  return categories[ruleId] ?? explicit ?? normalizeCwe(cwe) ?? ruleId
}

/**
 * Express a reported file path relative to the target with POSIX separators
 */
export function relativeToTarget(file: string, targetPath: string): string {
  const rel = isAbsolute(file) ? relative(targetPath, file) : file
  return normalizeFilePath(rel)
}

function positive(value: number | undefined): number | undefined {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : undefined
}

/**
 * Build a normalized finding, including its fingerprint
 */
export function createFinding(
  scannerId: string,
  input: FindingInput,
  settings: AdapterSettings,
  targetPath: string
): Finding {
  const file = input.file?.trim()
  const location = file
    ? {
        file: relativeToTarget(file, targetPath),
        line: positive(input.line),
        column: positive(input.column),
        endLine: positive(input.endLine),
        endColumn: positive(input.endColumn)
      }
    : undefined

  const reported = input.package
  const pkg = reported && reported.name.trim()
    ? {
        ...reported,
        manifest: reported.manifest ? relativeToTarget(reported.manifest, targetPath) : undefined
      }
    : undefined

  const category = resolveCategory(input.ruleId, settings.categories, input.category, input.cwe)

  const finding: Omit<Finding, 'fingerprint'> = {
    scannerId,
    ruleId: input.ruleId,
    category,
    severity: mapSeverity(input.severity, settings.severityMap),
    location,
    package: pkg,
    message: input.message,
    raw: input.raw
  }

  return { ...finding, fingerprint: fingerprintFinding(finding) }
}

function findingPath(finding: Finding): string | undefined {
  return finding.location?.file ?? finding.package?.manifest
}

function matchesAny(file: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(file, pattern, { dot: true }))
}

/**
 * Apply the severity floor and include/exclude globs. Findings without any
 * path are kept so they can be surfaced.
 */
export function filterFindings(findings: Finding[], settings: AdapterSettings): Finding[] {
  return findings.filter(finding => {
    if (!isAtLeast(finding.severity, settings.severityFloor)) {
      return false
    }
    const file = findingPath(finding)
    if (file === undefined) {
      return true
    }
    if (settings.include.length > 0 && !matchesAny(file, settings.include)) {
      return false
    }
    return !matchesAny(file, settings.exclude)
  })
}
