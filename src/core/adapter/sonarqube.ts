import { z } from 'zod'
import type { Finding, ScannerFamily } from '../../types/index.js'
import { compareSeverity } from '../../utils/severity.js'
import {
  AdapterCancelledError,
  AdapterInvocationError,
  AdapterParseError,
  AdapterTransientError
} from '../errors.js'
import type { AdapterContext, AdapterOutput, AdapterSettings, ScannerAdapter } from './base.js'
import { createFinding, mapSeverity, nativeLevelsAtOrAbove } from './finding.js'
import { parseRecords, parseWith } from './parse.js'

const NATIVE_LEVELS = ['INFO', 'MINOR', 'MAJOR', 'CRITICAL', 'BLOCKER'] as const

const DEFAULT_PAGE_SIZE = 500

// The issues API refuses to page past 10,000 results
const DEFAULT_MAX_PAGES = 20

const IssueSchema = z.object({
  key: z.string(),
  rule: z.string().min(1),
  severity: z.string().optional(),
  impacts: z.array(z.object({
    softwareQuality: z.string(),
    severity: z.string()
  }).passthrough()).optional(),
  component: z.string(),
  line: z.number().int().optional(),
  textRange: z.object({
    startLine: z.number().int(),
    endLine: z.number().int().optional(),
    startOffset: z.number().int().optional(),
    endOffset: z.number().int().optional()
  }).passthrough().optional(),
  message: z.string(),
  type: z.string().optional()
}).passthrough()

const IssuesPageSchema = z.object({
  issues: z.array(z.unknown()),
  total: z.number().int().optional(),
  paging: z.object({
    pageIndex: z.number().int(),
    pageSize: z.number().int(),
    total: z.number().int()
  }).optional()
}).passthrough()

type SonarIssue = z.output<typeof IssueSchema>

export interface SonarQubeOptions {
  serverUrl: string
  projectKey: string
  /** Environment variable holding the user token */
  tokenEnv?: string
  issueTypes: readonly string[]
  pageSize?: number
  maxPages?: number
  /** Environment the token is read from */
  env?: NodeJS.ProcessEnv
}

/**
 * Native HTTP request built by the quality-server adapter
 */
export interface HttpInvocation {
  method: 'GET'
  url: string
  headers: Record<string, string>
}

export interface IssuesPage {
  findings: Finding[]
  total: number
  received: number
}

/**
 * Code-quality server: reads open issues for a project from
 * `GET /api/issues/search`, following pagination.
 *
 * Each instance issues its own requests; nothing is shared with other adapters.
 */
export class SonarQubeAdapter implements ScannerAdapter {
  readonly name = 'SonarQube'
  readonly family: ScannerFamily = 'quality-server'
  private readonly pageSize: number
  private readonly maxPages: number

  constructor(
    readonly id: string,
    readonly settings: AdapterSettings,
    private readonly options: SonarQubeOptions
  ) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
  }

  invoke(_context: AdapterContext, page = 1): HttpInvocation {
    const params = new URLSearchParams({
      componentKeys: this.options.projectKey,
      types: this.options.issueTypes.join(','),
      resolved: 'false',
      ps: String(this.pageSize),
      p: String(page)
    })

    const levels = nativeLevelsAtOrAbove(NATIVE_LEVELS, this.settings.severityMap, this.settings.severityFloor)
    if (levels.length > 0 && levels.length < NATIVE_LEVELS.length) {
      params.set('severities', levels.join(','))
    }

    const headers: Record<string, string> = { Accept: 'application/json' }
    const env = this.options.env ?? process.env
    const token = this.options.tokenEnv ? env[this.options.tokenEnv] : undefined
    if (token) {
      headers.Authorization = `Bearer ${token}`
    }

    const base = this.options.serverUrl.replace(/\/+$/, '')
    return {
      method: 'GET',
      url: `${base}/api/issues/search?${params.toString()}`,
      headers
    }
  }

  /**
   * Convert one page of the issues response, appending to `parsed`
   */
  parse(body: unknown, context: AdapterContext, parsed: readonly Finding[] = []): IssuesPage {
    let page: z.output<typeof IssuesPageSchema>
    try {
      page = parseWith(this.id, IssuesPageSchema, body, 'issues response')
    } catch (err) {
      if (err instanceof AdapterParseError) {
        throw new AdapterParseError(this.id, err.message, parsed)
      }
      throw err
    }

    const findings = parseRecords(
      this.id,
      IssueSchema,
      page.issues,
      issue => [this.toFinding(issue, context)],
      parsed
    )

    return {
      findings,
      total: page.paging?.total ?? page.total ?? page.issues.length,
      received: page.issues.length
    }
  }

  async run(context: AdapterContext): Promise<AdapterOutput> {
    let findings: Finding[] = []

    for (let pageIndex = 1; pageIndex <= this.maxPages; pageIndex++) {
      const body = await this.request(this.invoke(context, pageIndex), context.signal, findings)
      const page = this.parse(body, context, findings)
      findings = page.findings

      if (page.received === 0 || pageIndex * this.pageSize >= page.total) {
        break
      }
    }

    return { findings, exitCode: null }
  }

  private async request(
    invocation: HttpInvocation,
    signal: AbortSignal,
    parsed: readonly Finding[]
  ): Promise<unknown> {
    let response: Response
    try {
      response = await fetch(invocation.url, {
        method: invocation.method,
        headers: invocation.headers,
        signal
      })
    } catch (err) {
      throw this.transportError(err, signal)
    }

    if (response.status === 429 || response.status >= 500) {
      throw new AdapterTransientError(this.id, `HTTP ${response.status} from ${this.options.serverUrl}`)
    }
    if (!response.ok) {
      throw new AdapterInvocationError(
        this.id,
        `HTTP ${response.status} from ${this.options.serverUrl}: check server_url, project_key and token`
      )
    }

    let text: string
    try {
      text = await response.text()
    } catch (err) {
      throw this.transportError(err, signal)
    }

    try {
      return JSON.parse(text)
    } catch (err) {
      throw new AdapterParseError(
        this.id,
        `Invalid JSON response: ${err instanceof Error ? err.message : String(err)}`,
        parsed
      )
    }
  }

  // A dropped connection surfaces from fetch or from reading the body
  private transportError(err: unknown, signal: AbortSignal): AdapterCancelledError | AdapterTransientError {
    if (signal.aborted) {
      return new AdapterCancelledError(this.id, 'Request aborted', { cause: err })
    }
    const message = err instanceof Error ? err.message : String(err)
    return new AdapterTransientError(this.id, `Request to ${this.options.serverUrl} failed: ${message}`, {
      cause: err
    })
  }

    private nativeSeverity(issue: SonarIssue): string {
    if (issue.severity) {
      return issue.severity
    }
    const impacts = [...(issue.impacts ?? [])].sort((a, b) =>
      compareSeverity(
        mapSeverity(b.severity, this.settings.severityMap),
        mapSeverity(a.severity, this.settings.severityMap)
      )
    )
    return impacts[0]?.severity ?? 'INFO'
  }

  private toFinding(issue: SonarIssue, context: AdapterContext): Finding {
    const prefix = `${this.options.projectKey}:`
    const file = issue.component.startsWith(prefix)
      ? issue.component.slice(prefix.length)
      : issue.component
    const range = issue.textRange

    return createFinding(
      this.id,
      {
        ruleId: issue.rule,
        severity: this.nativeSeverity(issue),
        message: issue.message,
        file,
        line: issue.line ?? range?.startLine,
        // text range offsets are zero-based
        column: range?.startOffset === undefined ? undefined : range.startOffset + 1,
        endLine: range?.endLine,
        endColumn: range?.endOffset === undefined ? undefined : range.endOffset + 1,
        raw: issue
      },
      this.settings,
      context.targetPath
    )
  }
}
