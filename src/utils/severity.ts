import type { FindingSummary, Severity } from '../types/index.js'

/**
 * Severities from most to least severe
 */
export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info']

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
  info: 0
}

/**
 * Compare two severities; positive when `a` is more severe than `b`
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b]
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b
}

/**
 * Check whether `severity` reaches `threshold`
 */
export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold]
}

export function emptySummary(): FindingSummary {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 }
}

export function summarize(items: Iterable<{ severity: Severity }>): FindingSummary {
  const summary = emptySummary()
  for (const item of items) {
    summary[item.severity]++
  }
  return summary
}
