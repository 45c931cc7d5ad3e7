import { z } from 'zod'
import type { Finding, ScannerFamily } from '../../types/index.js'
import type { AdapterContext, AdapterOutput, AdapterSettings } from './base.js'
import { runCommand, type CommandAdapter, type CommandInvocation, type ExitClass } from './command.js'
import { createFinding, nativeLevelsAtOrAbove } from './finding.js'
import { parseJson, parseRecords, parseWith } from './parse.js'
import type { ProcessResult } from './process.js'

const NATIVE_LEVELS = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const

// Vulnerability DB downloads and registry lookups fail this way when the network flaps
const TRANSIENT_STDERR = /failed to download|db error|connection (refused|reset)|i\/o timeout|tls handshake timeout|no such host|too many requests|\b(429|502|503|504)\b/i

const VulnerabilitySchema = z.object({
  VulnerabilityID: z.string().min(1),
  PkgName: z.string().min(1),
  InstalledVersion: z.string().default(''),
  FixedVersion: z.string().optional(),
  Severity: z.string(),
  Title: z.string().optional(),
  Description: z.string().optional()
}).passthrough()

const MisconfigurationSchema = z.object({
  ID: z.string().min(1),
  AVDID: z.string().optional(),
  Title: z.string().optional(),
  Message: z.string().optional(),
  Severity: z.string(),
  Status: z.string().optional(),
  CauseMetadata: z.object({
    StartLine: z.number().int().optional(),
    EndLine: z.number().int().optional()
  }).passthrough().optional()
}).passthrough()

const SecretSchema = z.object({
  RuleID: z.string().min(1),
  Title: z.string().optional(),
  Severity: z.string(),
  StartLine: z.number().int().optional(),
  EndLine: z.number().int().optional()
}).passthrough()

const TargetSchema = z.object({
  Target: z.string(),
  Type: z.string().optional(),
  Vulnerabilities: z.array(z.unknown()).nullish(),
  Misconfigurations: z.array(z.unknown()).nullish(),
  Secrets: z.array(z.unknown()).nullish()
}).passthrough()

const TrivyReportSchema = z.object({
  SchemaVersion: z.number().optional(),
  Results: z.array(TargetSchema).nullish()
}).passthrough()

/**
 * Filesystem vulnerability scanner: `trivy fs --format json .`
 *
 * Runs with `--exit-code 0`, so any other exit code is a tool error;
 * stderr tells network failures (retryable) from the rest.
 */
export class TrivyAdapter implements CommandAdapter {
  readonly name = 'Trivy'
  readonly family: ScannerFamily = 'filesystem-vuln'

  constructor(
    readonly id: string,
    readonly settings: AdapterSettings
  ) {}

  invoke(context: AdapterContext): CommandInvocation {
    const levels = nativeLevelsAtOrAbove(NATIVE_LEVELS, this.settings.severityMap, this.settings.severityFloor)
    const args = [
      'fs',
      '--format', 'json',
      '--quiet',
      '--exit-code', '0',
      '--severity', (levels.length > 0 ? levels : ['CRITICAL']).join(',')
    ]
    for (const pattern of this.settings.exclude) {
      args.push('--skip-dirs', pattern, '--skip-files', pattern)
    }
    args.push(...this.settings.args, '.')

    return {
      command: this.settings.binary ?? 'trivy',
      args,
      cwd: context.targetPath
    }
  }

  classifyExit(result: ProcessResult): ExitClass {
    if (result.exitCode === 0) {
      return 'ok'
    }
    return TRANSIENT_STDERR.test(result.stderr) ? 'transient' : 'failed'
  }

  parse(stdout: string, context: AdapterContext): Finding[] {
    const report = parseWith(this.id, TrivyReportSchema, parseJson(this.id, stdout), 'trivy report')
    let findings: Finding[] = []

    for (const target of report.Results ?? []) {
      findings = parseRecords(this.id, VulnerabilitySchema, target.Vulnerabilities ?? [], vuln => [
        createFinding(
          this.id,
          {
            ruleId: vuln.VulnerabilityID,
            severity: vuln.Severity,
            message: vuln.Title ?? vuln.Description ?? vuln.VulnerabilityID,
            package: {
              name: vuln.PkgName,
              version: vuln.InstalledVersion,
              ecosystem: target.Type,
              manifest: target.Target
            },
            category: vuln.VulnerabilityID,
            raw: vuln
          },
          this.settings,
          context.targetPath
        )
      ], findings)

      findings = parseRecords(this.id, MisconfigurationSchema, target.Misconfigurations ?? [], misconfig =>
        misconfig.Status === 'PASS'
          ? []
          : [
              createFinding(
                this.id,
                {
                  ruleId: misconfig.AVDID ?? misconfig.ID,
                  severity: misconfig.Severity,
                  message: misconfig.Message ?? misconfig.Title ?? misconfig.ID,
                  file: target.Target,
                  line: misconfig.CauseMetadata?.StartLine,
                  endLine: misconfig.CauseMetadata?.EndLine,
                  raw: misconfig
                },
                this.settings,
                context.targetPath
              )
            ], findings)

      findings = parseRecords(this.id, SecretSchema, target.Secrets ?? [], secret => [
        createFinding(
          this.id,
          {
            ruleId: secret.RuleID,
            severity: secret.Severity,
            message: secret.Title ?? secret.RuleID,
            file: target.Target,
            line: secret.StartLine,
            endLine: secret.EndLine,
            raw: secret
          },
          this.settings,
          context.targetPath
        )
      ], findings)
    }

    return findings
  }

  run(context: AdapterContext): Promise<AdapterOutput> {
    return runCommand(this, context)
  }
}
