import type { DedupGroup, Finding, Severity, Verdict } from '../../types/index.js'
import { maskSecrets } from '../../utils/mask.js'
import { emitReport, type JsonReportOptions, type Reporter } from './base.js'

type SarifLevel = 'error' | 'warning' | 'note'

interface SarifRule {
  id: string
  shortDescription: { text: string }
}

interface SarifRegion {
  startLine: number
  startColumn?: number
  endLine?: number
  endColumn?: number
}

interface SarifLocation {
  physicalLocation: {
    artifactLocation: { uri: string }
    region: SarifRegion
  }
}

interface SarifResult {
  ruleId: string
  level: SarifLevel
  message: { text: string }
  locations: SarifLocation[]
  partialFingerprints?: Record<string, string>
  properties: Record<string, unknown>
}

interface SarifNotification {
  level: SarifLevel
  message: { text: string }
  descriptor: { id: string }
}

interface SarifRun {
  tool: { driver: { name: string; version: string; rules: SarifRule[] } }
  invocations: Array<{
    executionSuccessful: boolean
    exitCode: number
    toolExecutionNotifications: SarifNotification[]
  }>
  results: SarifResult[]
}

export interface SarifLog {
  version: '2.1.0'
  $schema: string
  runs: SarifRun[]
}

const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json'

const FINGERPRINT_KEY = 'scanweave/v1'

export function toSarifLevel(severity: Severity): SarifLevel {
  return severity === 'critical' || severity === 'high'
    ? 'error'
    : severity === 'medium'
      ? 'warning'
      : 'note'
}

// SARIF URIs always use '/' separators
function toSarifUri(file: string | undefined): string {
  if (!file || !file.trim()) return '.'
  return file.trim().replace(/\\/g, '/')
}

function locationOf(item: Pick<Finding, 'location' | 'package'>): SarifLocation {
  if (item.location) {
    const { file, line, column, endLine, endColumn } = item.location
    return {
      physicalLocation: {
        artifactLocation: { uri: toSarifUri(file) },
        region: {
          startLine: line ?? 1,
          ...(column !== undefined ? { startColumn: column } : {}),
          ...(endLine !== undefined ? { endLine } : {}),
          ...(endColumn !== undefined ? { endColumn } : {})
        }
      }
    }
  }
  return {
    physicalLocation: {
      artifactLocation: { uri: toSarifUri(item.package?.manifest) },
      region: { startLine: 1 }
    }
  }
}

function groupResult(group: DedupGroup, mask: boolean): SarifResult {
  const message = group.findings[0]?.message ?? group.category
  return {
    ruleId: group.category,
    level: toSarifLevel(group.severity),
    message: { text: mask ? maskSecrets(message) : message },
    locations: [locationOf(group)],
    partialFingerprints: { [FINGERPRINT_KEY]: group.fingerprint },
    properties: {
      severity: group.severity,
      scanners: group.scanners,
      ruleIds: group.ruleIds,
      ...(group.package ? { package: group.package } : {})
    }
  }
}

function ungroupedResult(finding: Finding, mask: boolean): SarifResult {
  return {
    ruleId: finding.category,
    level: toSarifLevel(finding.severity),
    message: { text: mask ? maskSecrets(finding.message) : finding.message },
    locations: [locationOf(finding)],
    properties: {
      severity: finding.severity,
      scanners: [finding.scannerId],
      ruleIds: [finding.ruleId]
    }
  }
}

/**
 * Build a SARIF 2.1.0 log with one result per dedup group
 */
export function toSarif(verdict: Verdict, options: { maskSecrets?: boolean; toolVersion?: string } = {}): SarifLog {
  const mask = options.maskSecrets ?? true
  const results = [
    ...verdict.groups.map(group => groupResult(group, mask)),
    ...verdict.ungrouped.map(finding => ungroupedResult(finding, mask))
  ]

  const rules = [...new Set(results.map(result => result.ruleId))]
    .sort()
    .map(id => ({ id, shortDescription: { text: id } }))

  const notifications = verdict.scanners
    .filter(scanner => scanner.status !== 'succeeded')
    .map(scanner => ({
      level: scanner.required ? 'error' as const : 'warning' as const,
      message: { text: `${scanner.scannerId} ${scanner.status}${scanner.error ? `: ${scanner.error.message}` : ''}` },
      descriptor: { id: scanner.scannerId }
    }))

  return {
    version: '2.1.0',
    $schema: SARIF_SCHEMA,
    runs: [
      {
        tool: { driver: { name: 'scanweave', version: options.toolVersion ?? '1.0.0', rules } },
        invocations: [
          {
            executionSuccessful: verdict.exitCode !== 2,
            exitCode: verdict.exitCode,
            toolExecutionNotifications: notifications
          }
        ],
        results
      }
    ]
  }
}

/**
 * SARIF Reporter for code-scanning integrations
 */
export class SarifReporter implements Reporter {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'sarif',
    pretty: true,
    maskSecrets: true
  }

  generate(verdict: Verdict, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }
    const log = toSarif(verdict, { maskSecrets: opts.maskSecrets })
    return opts.pretty ? JSON.stringify(log, null, 2) : JSON.stringify(log)
  }

  async write(verdict: Verdict, options?: Partial<JsonReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    await emitReport(this.generate(verdict, opts), opts)
  }
}

export function createSarifReporter(): SarifReporter {
  return new SarifReporter()
}
