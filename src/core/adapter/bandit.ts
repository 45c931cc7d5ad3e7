import { z } from 'zod'
import type { Finding, ScannerFamily } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import type { AdapterContext, AdapterOutput, AdapterSettings } from './base.js'
import { runCommand, type CommandAdapter, type CommandInvocation, type ExitClass } from './command.js'
import { createFinding, nativeLevelsAtOrAbove } from './finding.js'
import { parseJson, parseRecords, parseWith } from './parse.js'
import type { ProcessResult } from './process.js'

const logger = createLogger('adapter:bandit')

/** Bandit's --severity-level choices, least severe first */
const NATIVE_LEVELS = ['LOW', 'MEDIUM', 'HIGH'] as const

const BanditResultSchema = z.object({
  test_id: z.string().min(1),
  test_name: z.string().optional(),
  issue_severity: z.string(),
  issue_confidence: z.string().optional(),
  issue_text: z.string(),
  issue_cwe: z.object({ id: z.number().int() }).passthrough().optional(),
  filename: z.string(),
  line_number: z.number().int(),
  col_offset: z.number().int().optional(),
  end_col_offset: z.number().int().optional(),
  line_range: z.array(z.number().int()).optional()
}).passthrough()

const BanditReportSchema = z.object({
  results: z.array(z.unknown()),
  errors: z.array(z.object({ filename: z.string(), reason: z.string() }).passthrough()).default([])
}).passthrough()

/**
 * Python linter: `bandit -r . -f json`
 *
 * Exit codes: 0 no issues, 1 issues found, anything else is a tool error.
 */
export class BanditAdapter implements CommandAdapter {
  readonly name = 'Bandit'
  readonly family: ScannerFamily = 'lint'

  constructor(
    readonly id: string,
    readonly settings: AdapterSettings
  ) {}

  invoke(context: AdapterContext): CommandInvocation {
    const levels = nativeLevelsAtOrAbove(NATIVE_LEVELS, this.settings.severityMap, this.settings.severityFloor)
    const lowest = levels.length === NATIVE_LEVELS.length ? 'all' : (levels[0] ?? 'HIGH').toLowerCase()

    const args = ['-r', '.', '-f', 'json', '-q', '--severity-level', lowest]
    if (this.settings.exclude.length > 0) {
      args.push('-x', this.settings.exclude.join(','))
    }
    args.push(...this.settings.args)

    return {
      command: this.settings.binary ?? 'bandit',
      args,
      cwd: context.targetPath
    }
  }

  classifyExit(result: ProcessResult): ExitClass {
    return result.exitCode === 0 || result.exitCode === 1 ? 'ok' : 'failed'
  }

  parse(stdout: string, context: AdapterContext): Finding[] {
    const report = parseWith(this.id, BanditReportSchema, parseJson(this.id, stdout), 'bandit report')

    for (const fileError of report.errors) {
      logger.warn(`${fileError.filename}: ${fileError.reason}`)
    }

    return parseRecords(this.id, BanditResultSchema, report.results, record => [
      createFinding(
        this.id,
        {
          ruleId: record.test_id,
          severity: record.issue_severity,
          message: record.issue_text,
          file: record.filename,
          line: record.line_number,
          // bandit columns are zero-based
          column: record.col_offset === undefined ? undefined : record.col_offset + 1,
          endLine: record.line_range?.at(-1),
          endColumn: record.end_col_offset === undefined ? undefined : record.end_col_offset + 1,
          cwe: record.issue_cwe?.id,
          raw: record
        },
        this.settings,
        context.targetPath
      )
    ])
  }

  run(context: AdapterContext): Promise<AdapterOutput> {
    return runCommand(this, context)
  }
}
