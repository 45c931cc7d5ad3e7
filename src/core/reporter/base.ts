import { writeFile } from 'node:fs/promises'
import type { Finding, ReportOptions, Verdict } from '../../types/index.js'
import { maskFinding } from '../../utils/mask.js'

/**
 * Base interface for all reporters
 */
export interface Reporter {
  /**
   * Generate a report from a verdict
   */
  generate(verdict: Verdict, options?: Partial<ReportOptions>): string

  /**
   * Write report to file or stdout
   */
  write(verdict: Verdict, options?: Partial<ReportOptions>): Promise<void>
}

/**
 * Extended report options with format-specific settings
 */
export interface JsonReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
  /** Mask secrets in finding messages and native records */
  maskSecrets?: boolean
}

/**
 * Mask secrets in every finding a verdict carries
 */
export function maskVerdict(verdict: Verdict): Verdict {
  const mask = (findings: readonly Finding[]) => findings.map(maskFinding)
  return {
    ...verdict,
    groups: verdict.groups.map(group => ({ ...group, findings: mask(group.findings) })),
    ungrouped: mask(verdict.ungrouped),
    suppressed: mask(verdict.suppressed)
  }
}

/**
 * Write rendered report to `output`, or to stdout unless quiet
 */
export async function emitReport(content: string, options: Partial<ReportOptions>): Promise<void> {
  if (options.output) {
    await writeFile(options.output, content, 'utf-8')
  } else if (!options.quiet) {
    process.stdout.write(content + '\n')
  }
}
