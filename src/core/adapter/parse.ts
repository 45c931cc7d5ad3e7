import type { z } from 'zod'
import type { Finding } from '../../types/index.js'
import { AdapterParseError } from '../errors.js'

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Parse a scanner's JSON document
 */
export function parseJson(scannerId: string, text: string): unknown {
  if (!text.trim()) {
    throw new AdapterParseError(scannerId, 'Scanner produced no output')
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new AdapterParseError(
      scannerId,
      `Invalid JSON output: ${err instanceof Error ? err.message : String(err)}`
    )
  }
}

/**
 * Validate a native document envelope
 */
export function parseWith<S extends z.ZodTypeAny>(
  scannerId: string,
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new AdapterParseError(scannerId, `Unexpected ${what}: ${formatIssues(result.error)}`)
  }
  return result.data
}

/**
 * Validate and convert native records in order. The first malformed record
 * raises an AdapterParseError carrying every finding built before it,
 * including those in `parsed`.
 */
export function parseRecords<S extends z.ZodTypeAny>(
  scannerId: string,
  schema: S,
  records: readonly unknown[],
  build: (record: z.output<S>) => Finding[],
  parsed: readonly Finding[] = []
): Finding[] {
  const findings = [...parsed]
  records.forEach((record, index) => {
    const result = schema.safeParse(record)
    if (!result.success) {
      throw new AdapterParseError(
        scannerId,
        `Malformed record #${index}: ${formatIssues(result.error)}`,
        findings
      )
    }
    findings.push(...build(result.data))
  })
  return findings
}
