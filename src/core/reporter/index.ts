import type { ReportOptions } from '../../types/index.js'
import type { Reporter } from './base.js'
import { JsonReporter } from './json.js'
import { MarkdownReporter } from './markdown.js'
import { SarifReporter } from './sarif.js'

export type { Reporter, JsonReportOptions } from './base.js'
export { JsonReporter } from './json.js'
export { MarkdownReporter } from './markdown.js'
export { SarifReporter, toSarif, toSarifLevel } from './sarif.js'

export type ReportFormat = ReportOptions['format']

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'markdown', 'sarif']

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some(format => format === value)
}

/**
 * Reporter for an output format
 */
export function createReporter(format: ReportFormat): Reporter {
  switch (format) {
    case 'markdown':
      return new MarkdownReporter()
    case 'sarif':
      return new SarifReporter()
    case 'json':
      return new JsonReporter()
  }
}
