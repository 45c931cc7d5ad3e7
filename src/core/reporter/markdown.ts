import type { DedupGroup, Finding, ScannerSummary, Severity, Verdict } from '../../types/index.js'
import { maskFinding } from '../../utils/mask.js'
import { SEVERITY_ORDER } from '../../utils/severity.js'
import { describeTarget } from '../verdict/index.js'
import { emitReport, type JsonReportOptions, type Reporter } from './base.js'

/**
 * Extended report options for Markdown reporter
 */
export type MarkdownReportOptions = JsonReportOptions

/**
 * Get verdict emoji and label
 */
function getVerdictBadge(verdict: Verdict): { emoji: string; label: string } {
  if (verdict.exitCode === 2) {
    return { emoji: '⚠️', label: 'ERROR' }
  }
  return verdict.passed
    ? { emoji: '✅', label: 'PASSED' }
    : { emoji: '🚫', label: 'FAILED' }
}

/**
 * Get severity emoji
 */
function getSeverityEmoji(severity: Severity): string {
  const emojis: Record<Severity, string> = {
    critical: '🔴',
    high: '🟠',
    medium: '🟡',
    low: '🔵',
    info: 'ℹ️'
  }
  return emojis[severity]
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Format duration in seconds
 */
function formatDuration(ms: number): string {
  return (ms / 1000).toFixed(2)
}

function cell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ')
}

/**
 * Generate summary section
 */
function generateSummarySection(verdict: Verdict): string {
  const lines: string[] = [
    '## Summary',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Target | \`${verdict.target}\` |`,
    `| Gating severity | ${capitalize(verdict.gatingSeverity)} |`,
    `| Finding groups | ${verdict.totals.groups} |`,
    `| Ungrouped findings | ${verdict.totals.ungrouped} |`,
    `| Suppressed findings | ${verdict.totals.suppressed} |`,
    `| Duration | ${formatDuration(verdict.duration)}s |`,
    '',
    '### Findings by Severity',
    '',
    '| Severity | Count |',
    '|----------|-------|'
  ]

  for (const severity of SEVERITY_ORDER) {
    lines.push(`| ${getSeverityEmoji(severity)} ${capitalize(severity)} | ${verdict.totals.bySeverity[severity]} |`)
  }
  lines.push('')

  return lines.join('\n')
}

function generateScannerRow(scanner: ScannerSummary): string {
  const error = scanner.error ? cell(scanner.error.message) : ''
  return `| ${scanner.scannerId} | ${scanner.status} | ${scanner.required ? 'yes' : 'no'} | ${scanner.findingCount} | ${scanner.attempts} | ${formatDuration(scanner.duration)}s | ${error} |`
}

/**
 * Generate per-scanner section
 */
function generateScannersSection(scanners: readonly ScannerSummary[]): string {
  const lines: string[] = [
    '## Scanners',
    '',
    '| Scanner | Status | Required | Findings | Attempts | Duration | Error |',
    '|---------|--------|----------|----------|----------|----------|-------|',
    ...scanners.map(generateScannerRow),
    ''
  ]
  return lines.join('\n')
}

/**
 * Generate one dedup group
 */
function generateGroupItem(group: DedupGroup, maskSecrets: boolean): string {
  const lines: string[] = [
    `#### ${group.category}`,
    '',
    `**Location:** \`${describeTarget(group)}\``,
    `**Scanners:** ${group.scanners.join(', ')}`,
    `**Rules:** ${group.ruleIds.map(id => `\`${id}\``).join(', ')}`,
    `**Fingerprint:** \`${group.fingerprint}\``,
    ''
  ]

  for (const finding of group.findings) {
    const shown = maskSecrets ? maskFinding(finding) : finding
    lines.push(`- **${shown.scannerId}** (${shown.severity}): ${shown.message}`)
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * Generate findings section
 */
function generateFindingsSection(groups: readonly DedupGroup[], maskSecrets: boolean): string {
  if (groups.length === 0) {
    return '## Findings\n\n✅ No security issues found.\n'
  }

  const lines: string[] = ['## Findings', '']

  for (const severity of SEVERITY_ORDER) {
    const matching = groups.filter(group => group.severity === severity)
    if (matching.length === 0) {
      continue
    }

    lines.push(`### ${getSeverityEmoji(severity)} ${capitalize(severity)} (${matching.length})`)
    lines.push('')

    for (const group of matching) {
      lines.push(generateGroupItem(group, maskSecrets))
    }
  }

  return lines.join('\n')
}

/**
 * Generate section for findings that could not be deduplicated
 */
function generateUngroupedSection(findings: readonly Finding[], maskSecrets: boolean): string {
  if (findings.length === 0) {
    return ''
  }

  const lines: string[] = ['## Ungrouped Findings', '']
  for (const finding of findings) {
    const shown = maskSecrets ? maskFinding(finding) : finding
    lines.push(`- **${shown.scannerId}** \`${shown.ruleId}\` (${shown.severity}): ${shown.message}`)
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * Generate a bulleted section, omitted when empty
 */
function generateListSection(title: string, items: readonly string[]): string {
  if (items.length === 0) {
    return ''
  }

  const lines: string[] = [`## ${title}`, '']
  for (const item of items) {
    lines.push(`- ${item}`)
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * Markdown Reporter for verdicts
 *
 * Outputs a human-readable report with per-scanner provenance.
 * Secrets in finding messages are masked.
 */
export class MarkdownReporter implements Reporter {
  private readonly defaultOptions: MarkdownReportOptions = {
    format: 'markdown',
    maskSecrets: true
  }

  /**
   * Generate Markdown string from a verdict
   */
  generate(verdict: Verdict, options?: Partial<MarkdownReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    const { emoji, label } = getVerdictBadge(verdict)
    const maskSecrets = opts.maskSecrets ?? true

    const header = [
      '# Security Scan Report',
      '',
      `**Verdict:** ${emoji} **${label}** (exit code ${verdict.exitCode})`,
      '',
      verdict.summary,
      '',
      `*Generated: ${verdict.timestamp}*`,
      '',
      '---',
      ''
    ].join('\n')

    // Optional sections render as '' when empty
    const sections: string[] = [
      header,
      generateSummarySection(verdict),
      generateScannersSection(verdict.scanners),
      generateListSection('Reasons', verdict.reasons),
      generateFindingsSection(verdict.groups, maskSecrets),
      generateUngroupedSection(verdict.ungrouped, maskSecrets),
      generateListSection('Warnings', verdict.warnings),
      '---'
    ]

    return sections.filter(Boolean).join('\n')
  }

  /**
   * Write report to file or stdout
   */
  async write(verdict: Verdict, options?: Partial<MarkdownReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    await emitReport(this.generate(verdict, opts), opts)
  }
}

/**
 * Create a new Markdown reporter instance
 */
export function createMarkdownReporter(): MarkdownReporter {
  return new MarkdownReporter()
}
