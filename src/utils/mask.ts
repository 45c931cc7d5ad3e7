/**
 * Masking utilities for sensitive information
 */

/**
 * Mask a secret value, showing only a prefix
 */
export function maskSecret(
  value: string,
  options: { prefixLength?: number; suffixLength?: number; maskChar?: string } = {}
): string {
  const { prefixLength = 4, suffixLength = 4, maskChar = '*' } = options

  if (value.length <= prefixLength + suffixLength) {
    return maskChar.repeat(value.length)
  }

  const prefix = value.slice(0, prefixLength)
  const maskLength = Math.min(value.length - prefixLength - suffixLength, 8)

  return `${prefix}${maskChar.repeat(maskLength)}[MASKED]`
}

/**
 * Common secret patterns to mask
 */
export const SECRET_PATTERNS: readonly RegExp[] = [
  // AWS keys
  /AKIA[0-9A-Z]{16}/g,
  // GitHub tokens
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  // Slack tokens
  /xox[baprs]-[a-zA-Z0-9-]{10,}/g,
  // Private keys
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g
]

/**
 * Mask all secret patterns in a string
 */
export function maskSecrets(text: string, patterns: readonly RegExp[] = SECRET_PATTERNS): string {
  let result = text

  for (const pattern of patterns) {
    result = result.replace(pattern, match => maskSecret(match))
  }

  return result
}

/**
 * Mask secrets in every string of a native record, leaving its shape intact
 */
export function maskValue(value: unknown, patterns: readonly RegExp[] = SECRET_PATTERNS): unknown {
  if (typeof value === 'string') {
    return maskSecrets(value, patterns)
  }
  if (Array.isArray(value)) {
    return value.map(item => maskValue(item, patterns))
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, maskValue(item, patterns)])
    )
  }
  return value
}

/**
 * Mask secrets in a finding's message and native record
 */
export function maskFinding<T extends { message: string; raw: unknown }>(finding: T): T {
  return {
    ...finding,
    message: maskSecrets(finding.message),
    raw: maskValue(finding.raw)
  }
}
