import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { MarkdownReporter, createMarkdownReporter } from './markdown.js'
import type { DedupGroup, Finding, Verdict } from '../../types/index.js'

vi.mock('node:fs/promises', () => ({
  writeFile: vi.fn()
}))

const mockWriteFile = vi.mocked(writeFile)

const awsKey = 'AKIATESTTESTTEST0000'

function createMockFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    scannerId: 'bandit',
    ruleId: 'B608',
    category: 'CWE-89',
    severity: 'medium',
    location: { file: 'app/db.py', line: 12 },
    message: 'Possible SQL injection',
    fingerprint: 'aaaaaaaaaaaaaaaa',
    raw: {},
    ...overrides
  }
}

function createMockGroup(findings: Finding[], overrides: Partial<DedupGroup> = {}): DedupGroup {
  const [first] = findings
  return {
    fingerprint: first?.fingerprint ?? 'aaaaaaaaaaaaaaaa',
    severity: first?.severity ?? 'medium',
    category: first?.category ?? 'CWE-89',
    scanners: [...new Set(findings.map(f => f.scannerId))].sort(),
    ruleIds: [...new Set(findings.map(f => f.ruleId))].sort(),
    findings,
    location: first?.location,
    package: first?.package,
    ...overrides
  }
}

function createMockVerdict(overrides: Partial<Verdict> = {}): Verdict {
  return {
    passed: true,
    exitCode: 0,
    gatingSeverity: 'high',
    groups: [],
    ungrouped: [],
    suppressed: [],
    scanners: [
      { scannerId: 'bandit', status: 'succeeded', required: true, exitCode: 0, duration: 1200, attempts: 1, findingCount: 0 }
    ],
    totals: {
      bySeverity: { critical: 0, high: 0, medium: 0, low: 0, info: 0 },
      byScanner: { bandit: 0 },
      groups: 0,
      ungrouped: 0,
      suppressed: 0
    },
    gateBreached: false,
    requiredScannerFailed: false,
    reasons: [],
    warnings: [],
    summary: 'PASSED: No findings from 1 scanner(s)',
    target: '/work/project',
    timestamp: '2026-02-02T12:00:00.000Z',
    duration: 2500,
    ...overrides
  }
}

describe('MarkdownReporter', () => {
  let reporter: MarkdownReporter
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>

  beforeEach(() => {
    reporter = new MarkdownReporter()
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    mockWriteFile.mockClear()
  })

  afterEach(() => {
    stdoutWriteSpy.mockRestore()
  })

  describe('generate', () => {
    it('should generate markdown with a title and summary', () => {
      const md = reporter.generate(createMockVerdict())

      expect(md.startsWith('# Security Scan Report\n')).toBe(true)
      expect(md).toContain('\nPASSED: No findings from 1 scanner(s)\n')
      expect(md).toContain('*Generated: 2026-02-02T12:00:00.000Z*')
    })

    it('should include the badge for a passed run', () => {
      const md = reporter.generate(createMockVerdict())

      expect(md).toContain('**Verdict:** ✅ **PASSED** (exit code 0)')
    })

    it('should include the badge for a breached gate', () => {
      const md = reporter.generate(createMockVerdict({ passed: false, exitCode: 1 }))

      expect(md).toContain('**Verdict:** 🚫 **FAILED** (exit code 1)')
    })

    it('should include the badge for an infrastructure error', () => {
      const md = reporter.generate(createMockVerdict({ passed: false, exitCode: 2 }))

      expect(md).toContain('**Verdict:** ⚠️ **ERROR** (exit code 2)')
    })

    it('should include the summary table', () => {
      const md = reporter.generate(createMockVerdict({
        totals: {
          bySeverity: { critical: 1, high: 2, medium: 0, low: 0, info: 0 },
          byScanner: { bandit: 4 },
          groups: 3,
          ungrouped: 1,
          suppressed: 2
        }
      }))

      expect(md).toContain('| Target | `/work/project` |')
      expect(md).toContain('| Gating severity | High |')
      expect(md).toContain('| Finding groups | 3 |')
      expect(md).toContain('| Ungrouped findings | 1 |')
      expect(md).toContain('| Suppressed findings | 2 |')
      expect(md).toContain('| Duration | 2.50s |')
      expect(md).toContain('| 🔴 Critical | 1 |')
      expect(md).toContain('| 🟠 High | 2 |')
    })

    it('should list every scanner with its outcome', () => {
      const md = reporter.generate(createMockVerdict({
        scanners: [
          { scannerId: 'bandit', status: 'succeeded', required: true, exitCode: 1, duration: 1200, attempts: 1, findingCount: 3 },
          {
            scannerId: 'sonarqube',
            status: 'failed',
            required: false,
            exitCode: null,
            duration: 4000,
            attempts: 2,
            findingCount: 0,
            error: { kind: 'transient', message: 'HTTP 503 | retry later' }
          }
        ]
      }))

      expect(md).toContain('| bandit | succeeded | yes | 3 | 1 | 1.20s |  |')
      expect(md).toContain('| sonarqube | failed | no | 0 | 2 | 4.00s | HTTP 503 \\| retry later |')
    })

    it('should list groups by severity with their provenance', () => {
      const bandit = createMockFinding()
      const sonar = createMockFinding({ scannerId: 'sonarqube', ruleId: 'python:S3649', severity: 'high', message: 'Build the query with parameters' })
      const dependency = createMockFinding({
        scannerId: 'trivy',
        ruleId: 'CVE-2024-0001',
        category: 'CVE-2024-0001',
        severity: 'critical',
        location: undefined,
        package: { name: 'requests', version: '2.0.0' },
        fingerprint: 'bbbbbbbbbbbbbbbb',
        message: 'Vulnerable package'
      })
      const md = reporter.generate(createMockVerdict({
        groups: [createMockGroup([dependency]), createMockGroup([bandit, sonar], { severity: 'high' })]
      }))

      expect(md).toContain('### 🔴 Critical (1)')
      expect(md).toContain('### 🟠 High (1)')
      expect(md.indexOf('### 🔴 Critical (1)')).toBeLessThan(md.indexOf('### 🟠 High (1)'))
      expect(md).toContain('**Location:** `requests@2.0.0`')
      expect(md).toContain('**Location:** `app/db.py:12`')
      expect(md).toContain('**Scanners:** bandit, sonarqube')
      expect(md).toContain('**Rules:** `B608`, `python:S3649`')
      expect(md).toContain('**Fingerprint:** `aaaaaaaaaaaaaaaa`')
      expect(md).toContain('- **bandit** (medium): Possible SQL injection')
      expect(md).toContain('- **sonarqube** (high): Build the query with parameters')
    })

    it('should mask secrets in finding messages by default', () => {
      const finding = createMockFinding({ message: `Hardcoded key ${awsKey}` })
      const md = reporter.generate(createMockVerdict({ groups: [createMockGroup([finding])] }))

      expect(md).toContain('- **bandit** (medium): Hardcoded key AKIA********[MASKED]')
      expect(md).not.toContain(awsKey)
    })

    it('should preserve secrets when maskSecrets is false', () => {
      const finding = createMockFinding({ message: `Hardcoded key ${awsKey}` })
      const md = reporter.generate(createMockVerdict({ groups: [createMockGroup([finding])] }), { maskSecrets: false })

      expect(md).toContain(awsKey)
    })

    it('should list ungrouped findings', () => {
      const floating = createMockFinding({ scannerId: 'sonarqube', ruleId: 'python:S1', location: undefined, fingerprint: null, message: 'Project-level issue' })
      const md = reporter.generate(createMockVerdict({ ungrouped: [floating] }))

      expect(md).toContain('## Ungrouped Findings')
      expect(md).toContain('- **sonarqube** `python:S1` (medium): Project-level issue')
    })

    it('should include reasons and warnings when present', () => {
      const md = reporter.generate(createMockVerdict({
        reasons: ['HIGH: CWE-89 at app/db.py:12 (bandit, sonarqube)'],
        warnings: ['Scanner "sonarqube" failed: HTTP 503 from https://sonar.example.test']
      }))

      expect(md).toContain('## Reasons\n\n- HIGH: CWE-89 at app/db.py:12 (bandit, sonarqube)\n')
      expect(md).toContain('## Warnings\n\n- Scanner "sonarqube" failed: HTTP 503 from https://sonar.example.test\n')
    })

    it('should omit empty sections', () => {
      const md = reporter.generate(createMockVerdict())

      expect(md).not.toContain('## Reasons')
      expect(md).not.toContain('## Warnings')
      expect(md).not.toContain('## Ungrouped Findings')
    })

    it('should show a no findings message when there are no groups', () => {
      const md = reporter.generate(createMockVerdict())

      expect(md).toContain('## Findings\n\n✅ No security issues found.')
    })
  })

  describe('write', () => {
    it('should write to stdout when no output file is given', async () => {
      await reporter.write(createMockVerdict())

      expect(stdoutWriteSpy).toHaveBeenCalledTimes(1)
      expect(mockWriteFile).not.toHaveBeenCalled()
    })

    it('should write to the output file', async () => {
      await reporter.write(createMockVerdict(), { output: '/tmp/report.md' })

      expect(mockWriteFile).toHaveBeenCalledWith('/tmp/report.md', expect.stringContaining('# Security Scan Report'), 'utf-8')
    })
  })

  describe('createMarkdownReporter', () => {
    it('should create a MarkdownReporter', () => {
      expect(createMarkdownReporter()).toBeInstanceOf(MarkdownReporter)
    })
  })
})
