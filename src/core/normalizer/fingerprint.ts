import { posix } from 'path'
import type { Finding } from '../../types/index.js'
import { stableHash } from '../../utils/hash.js'

/**
 * POSIX separators, no leading `./`, collapsed `..` and duplicate slashes
 */
export function normalizeFilePath(file: string): string {
  let normalized = posix.normalize(file.trim().replace(/\\/g, '/'))
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2)
  }
  return normalized
}

/**
 * Key of what a finding is about: its package coordinate when it has one,
 * otherwise its file and start line. Null when it has neither.
 */
export function locationKey(finding: Pick<Finding, 'location' | 'package'>): string | null {
  const pkg = finding.package
  if (pkg && pkg.name.trim()) {
    return `pkg:${pkg.name.trim().toLowerCase()}@${pkg.version.trim()}`
  }
  const file = finding.location?.file.trim()
  if (file) {
    return `file:${normalizeFilePath(file)}:${finding.location?.line ?? 0}`
  }
  return null
}

export function computeFingerprint(key: string, category: string): string {
  return stableHash(`${key}|${category.trim().toLowerCase()}`)
}

/**
 * Deterministic dedup key from location (or package) and rule category.
 * Message text and the producing scanner never contribute.
 */
export function fingerprintFinding(
  finding: Pick<Finding, 'location' | 'package' | 'category'>
): string | null {
  const key = locationKey(finding)
  return key === null ? null : computeFingerprint(key, finding.category)
}
