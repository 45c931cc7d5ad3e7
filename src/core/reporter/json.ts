import type { Verdict } from '../../types/index.js'
import { emitReport, maskVerdict, type JsonReportOptions, type Reporter } from './base.js'

/** Version of the JSON report layout */
export const REPORT_VERSION = '1.0.0'

/**
 * JSON Reporter for verdicts
 *
 * Outputs the full verdict for machine consumption, including every
 * finding's native record. Secrets in messages and records are masked.
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'json',
    pretty: true,
    maskSecrets: true
  }

  /**
   * Generate JSON string from a verdict
   */
  generate(verdict: Verdict, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    const output = {
      version: REPORT_VERSION,
      ...(opts.maskSecrets ? maskVerdict(verdict) : verdict)
    }

    if (opts.pretty) {
      return JSON.stringify(output, null, 2)
    }

    return JSON.stringify(output)
  }

  /**
   * Write report to file or stdout
   */
  async write(verdict: Verdict, options?: Partial<JsonReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    await emitReport(this.generate(verdict, opts), opts)
  }
}

/**
 * Create a new JSON reporter instance
 */
export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
