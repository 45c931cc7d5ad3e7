import { z } from 'zod'
import type { Finding, ScannerFamily } from '../../types/index.js'
import { AdapterParseError } from '../errors.js'
import type { AdapterContext, AdapterOutput, AdapterSettings } from './base.js'
import { runCommand, type CommandAdapter, type CommandInvocation, type ExitClass } from './command.js'
import { createFinding } from './finding.js'
import { parseJson, parseRecords, parseWith } from './parse.js'
import type { ProcessResult } from './process.js'

/** osv-scanner exit code when no package sources were found */
const EXIT_NO_PACKAGES = 128

const TRANSIENT_STDERR = /connection (refused|reset)|i\/o timeout|tls handshake timeout|no such host|too many requests|status code:? (429|5\d\d)|\bEOF\b/i

const VulnerabilitySchema = z.object({
  id: z.string().min(1),
  aliases: z.array(z.string()).nullish(),
  summary: z.string().optional(),
  details: z.string().optional(),
  database_specific: z.object({ severity: z.string().optional() }).passthrough().nullish()
}).passthrough()

const GroupSchema = z.object({
  ids: z.array(z.string()),
  max_severity: z.string().optional()
}).passthrough()

const PackageEntrySchema = z.object({
  package: z.object({
    name: z.string().min(1),
    version: z.string().default(''),
    ecosystem: z.string().optional()
  }).passthrough(),
  vulnerabilities: z.array(z.unknown()).nullish(),
  groups: z.array(GroupSchema).nullish()
}).passthrough()

const SourceResultSchema = z.object({
  source: z.object({ path: z.string(), type: z.string().optional() }).passthrough().optional(),
  packages: z.array(PackageEntrySchema).nullish()
}).passthrough()

const OsvReportSchema = z.object({
  results: z.array(SourceResultSchema).nullish()
}).passthrough()

type OsvVulnerability = z.output<typeof VulnerabilitySchema>
type OsvGroup = z.output<typeof GroupSchema>

/**
 * Qualitative CVSS v3 rating of a base score
 */
export function cvssRating(score: number): string {
  if (score >= 9.0) return 'CRITICAL'
  if (score >= 7.0) return 'HIGH'
  if (score >= 4.0) return 'MEDIUM'
  if (score > 0) return 'LOW'
  return 'NONE'
}

/**
 * Native severity label of one advisory: the database's own label when it
 * has one, otherwise the rating of its group's highest CVSS score.
 */
export function nativeSeverity(vuln: OsvVulnerability, groups: readonly OsvGroup[]): string {
  const label = vuln.database_specific?.severity
  if (label) {
    return label
  }
  const group = groups.find(g => g.ids.includes(vuln.id))
  const score = group?.max_severity ? Number.parseFloat(group.max_severity) : Number.NaN
  return Number.isFinite(score) ? cvssRating(score) : 'UNKNOWN'
}

/**
 * Advisory identity shared across databases: the first CVE among the id
 * and its aliases, otherwise the id
 */
export function canonicalAdvisoryId(vuln: OsvVulnerability): string {
  const cves = [vuln.id, ...(vuln.aliases ?? [])]
    .filter(id => /^CVE-\d{4}-\d+$/i.test(id))
    .map(id => id.toUpperCase())
    .sort()
  return cves[0] ?? vuln.id
}

/**
 * Dependency vulnerability scanner: `osv-scanner --format json --recursive .`
 *
 * Exit codes: 0 clean, 1 vulnerabilities found, 128 no packages found;
 * other codes are tool errors.
 */
export class OsvScannerAdapter implements CommandAdapter {
  readonly name = 'OSV-Scanner'
  readonly family: ScannerFamily = 'dependency-vuln'

  constructor(
    readonly id: string,
    readonly settings: AdapterSettings
  ) {}

  invoke(context: AdapterContext): CommandInvocation {
    return {
      command: this.settings.binary ?? 'osv-scanner',
      args: ['--format', 'json', '--recursive', ...this.settings.args, '.'],
      cwd: context.targetPath
    }
  }

  classifyExit(result: ProcessResult): ExitClass {
    if (result.exitCode === 0 || result.exitCode === 1 || result.exitCode === EXIT_NO_PACKAGES) {
      return 'ok'
    }
    return TRANSIENT_STDERR.test(result.stderr) ? 'transient' : 'failed'
  }

  parse(stdout: string, context: AdapterContext, exitCode: number | null = 0): Finding[] {
    if (!stdout.trim()) {
      // No package sources: osv-scanner may print nothing
      if (exitCode === EXIT_NO_PACKAGES) {
        return []
      }
      throw new AdapterParseError(this.id, `Empty output with exit code ${exitCode ?? 'none'}`)
    }

    const report = parseWith(this.id, OsvReportSchema, parseJson(this.id, stdout), 'osv-scanner report')
    let findings: Finding[] = []

    for (const source of report.results ?? []) {
      for (const entry of source.packages ?? []) {
        const groups = entry.groups ?? []
        findings = parseRecords(this.id, VulnerabilitySchema, entry.vulnerabilities ?? [], vuln => [
          createFinding(
            this.id,
            {
              ruleId: vuln.id,
              severity: nativeSeverity(vuln, groups),
              message: vuln.summary ?? vuln.details ?? vuln.id,
              package: {
                name: entry.package.name,
                version: entry.package.version,
                ecosystem: entry.package.ecosystem,
                manifest: source.source?.path
              },
              category: canonicalAdvisoryId(vuln),
              raw: vuln
            },
            this.settings,
            context.targetPath
          )
        ], findings)
      }
    }

    return findings
  }

  run(context: AdapterContext): Promise<AdapterOutput> {
    return runCommand(this, context)
  }
}
