import { minimatch } from 'minimatch'
import type { DedupGroup, Finding, ScanResult } from '../../types/index.js'
import { maxSeverity } from '../../utils/severity.js'
import type { Exception } from '../config/schema.js'

export {
  computeFingerprint,
  fingerprintFinding,
  locationKey,
  normalizeFilePath
} from './fingerprint.js'

export interface NormalizationResult {
  /** Sorted by fingerprint */
  groups: DedupGroup[]
  /** Findings without a fingerprint, in input order */
  ungrouped: Finding[]
  /** Findings removed by exceptions */
  suppressed: Finding[]
  warnings: string[]
}

export interface NormalizeOptions {
  exceptions?: readonly Exception[]
}

/**
 * Findings that take part in dedup: those of succeeded results plus the
 * partial findings of results that failed while parsing
 */
export function collectFindings(results: readonly ScanResult[]): Finding[] {
  return results.flatMap(result =>
    result.status === 'succeeded' || result.status === 'failed' ? result.findings : []
  )
}

function findingPath(finding: Finding): string | undefined {
  return finding.location?.file ?? finding.package?.manifest
}

function isSuppressed(finding: Finding, exceptions: readonly Exception[]): boolean {
  const file = findingPath(finding)
  if (file === undefined) {
    return false
  }
  const category = finding.category.toLowerCase()
  return exceptions.some(exception =>
    minimatch(file, exception.pattern, { dot: true }) &&
    exception.ignore.some(rule => rule === finding.ruleId || rule.toLowerCase() === category)
  )
}

/**
 * Split findings into kept and suppressed by configured exceptions
 */
export function applyExceptions(
  findings: readonly Finding[],
  exceptions: readonly Exception[]
): { kept: Finding[]; suppressed: Finding[] } {
  const kept: Finding[] = []
  const suppressed: Finding[] = []
  for (const finding of findings) {
    if (exceptions.length > 0 && isSuppressed(finding, exceptions)) {
      suppressed.push(finding)
    } else {
      kept.push(finding)
    }
  }
  return { kept, suppressed }
}

function byFingerprint(a: DedupGroup, b: DedupGroup): number {
  if (a.fingerprint === b.fingerprint) return 0
  return a.fingerprint < b.fingerprint ? -1 : 1
}

function freezeGroup(members: Finding[], fingerprint: string): DedupGroup {
  const [first, ...rest] = members
  if (!first) {
    throw new Error(`Empty dedup group ${fingerprint}`)
  }

  return Object.freeze({
    fingerprint,
    severity: rest.reduce((max, finding) => maxSeverity(max, finding.severity), first.severity),
    category: first.category,
    scanners: Object.freeze([...new Set(members.map(f => f.scannerId))].sort()),
    ruleIds: Object.freeze([...new Set(members.map(f => f.ruleId))].sort()),
    findings: Object.freeze([...members]),
    location: first.location,
    package: first.package
  })
}

/**
 * Group findings by fingerprint. Findings without one stay ungrouped and
 * each produces a warning.
 */
export function groupFindings(findings: readonly Finding[]): {
  groups: DedupGroup[]
  ungrouped: Finding[]
  warnings: string[]
} {
  const members = new Map<string, Finding[]>()
  const ungrouped: Finding[] = []
  const warnings: string[] = []

  for (const finding of findings) {
    if (finding.fingerprint === null) {
      ungrouped.push(finding)
      warnings.push(`${finding.scannerId}: ${finding.ruleId} has neither a location nor a package; not deduplicated`)
      continue
    }
    const group = members.get(finding.fingerprint)
    if (group) {
      group.push(finding)
    } else {
      members.set(finding.fingerprint, [finding])
    }
  }

  const groups = [...members.entries()]
    .map(([fingerprint, grouped]) => freezeGroup(grouped, fingerprint))
    .sort(byFingerprint)

  return { groups, ungrouped, warnings }
}

/**
 * Flatten, filter by exceptions and deduplicate the findings of a run.
 * Pure: the same results always give an equal output.
 */
export function normalize(
  results: readonly ScanResult[],
  options: NormalizeOptions = {}
): NormalizationResult {
  const { kept, suppressed } = applyExceptions(collectFindings(results), options.exceptions ?? [])
  return { ...groupFindings(kept), suppressed }
}
