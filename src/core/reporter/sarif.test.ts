import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { SarifReporter, createSarifReporter, toSarif, toSarifLevel } from './sarif.js'
import type { DedupGroup, Finding, Verdict } from '../../types/index.js'

vi.mock('node:fs/promises', () => ({
  writeFile: vi.fn()
}))

const mockWriteFile = vi.mocked(writeFile)

function createMockFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    scannerId: 'bandit',
    ruleId: 'B608',
    category: 'CWE-89',
    severity: 'high',
    location: { file: 'app/db.py', line: 12, column: 5 },
    message: 'Possible SQL injection',
    fingerprint: 'aaaaaaaaaaaaaaaa',
    raw: {},
    ...overrides
  }
}

function createMockGroup(findings: Finding[]): DedupGroup {
  const [first] = findings
  return {
    fingerprint: first?.fingerprint ?? 'aaaaaaaaaaaaaaaa',
    severity: first?.severity ?? 'high',
    category: first?.category ?? 'CWE-89',
    scanners: [...new Set(findings.map(f => f.scannerId))].sort(),
    ruleIds: [...new Set(findings.map(f => f.ruleId))].sort(),
    findings,
    location: first?.location,
    package: first?.package
  }
}

function createMockVerdict(overrides: Partial<Verdict> = {}): Verdict {
  return {
    passed: false,
    exitCode: 1,
    gatingSeverity: 'high',
    groups: [],
    ungrouped: [],
    suppressed: [],
    scanners: [
      { scannerId: 'bandit', status: 'succeeded', required: true, exitCode: 1, duration: 1200, attempts: 1, findingCount: 1 }
    ],
    totals: {
      bySeverity: { critical: 0, high: 1, medium: 0, low: 0, info: 0 },
      byScanner: { bandit: 1 },
      groups: 1,
      ungrouped: 0,
      suppressed: 0
    },
    gateBreached: true,
    requiredScannerFailed: false,
    reasons: [],
    warnings: [],
    summary: 'FAILED: 1 finding group(s) at or above HIGH',
    target: '/work/project',
    timestamp: '2026-02-02T12:00:00.000Z',
    duration: 1200,
    ...overrides
  }
}

const lintGroup = createMockGroup([
  createMockFinding(),
  createMockFinding({ scannerId: 'sonarqube', ruleId: 'python:S3649', message: 'Build the query with parameters' })
])

const dependencyGroup = createMockGroup([
  createMockFinding({
    scannerId: 'osv-scanner',
    ruleId: 'GHSA-aaaa-bbbb-cccc',
    category: 'CVE-2024-0001',
    severity: 'medium',
    location: undefined,
    package: { name: 'requests', version: '2.0.0', manifest: 'requirements.txt' },
    fingerprint: 'bbbbbbbbbbbbbbbb',
    message: 'Credentials leaked on redirect'
  })
])

describe('toSarifLevel', () => {
  it('should map severities onto SARIF levels', () => {
    expect(toSarifLevel('critical')).toBe('error')
    expect(toSarifLevel('high')).toBe('error')
    expect(toSarifLevel('medium')).toBe('warning')
    expect(toSarifLevel('low')).toBe('note')
    expect(toSarifLevel('info')).toBe('note')
  })
})

describe('toSarif', () => {
  it('should emit one result per dedup group', () => {
    const log = toSarif(createMockVerdict({ groups: [lintGroup, dependencyGroup] }))
    const run = log.runs[0]

    expect(log.version).toBe('2.1.0')
    expect(run?.tool.driver.name).toBe('scanweave')
    expect(run?.results).toEqual([
      {
        ruleId: 'CWE-89',
        level: 'error',
        message: { text: 'Possible SQL injection' },
        locations: [{
          physicalLocation: {
            artifactLocation: { uri: 'app/db.py' },
            region: { startLine: 12, startColumn: 5 }
          }
        }],
        partialFingerprints: { 'scanweave/v1': 'aaaaaaaaaaaaaaaa' },
        properties: { severity: 'high', scanners: ['bandit', 'sonarqube'], ruleIds: ['B608', 'python:S3649'] }
      },
      {
        ruleId: 'CVE-2024-0001',
        level: 'warning',
        message: { text: 'Credentials leaked on redirect' },
        locations: [{
          physicalLocation: {
            artifactLocation: { uri: 'requirements.txt' },
            region: { startLine: 1 }
          }
        }],
        partialFingerprints: { 'scanweave/v1': 'bbbbbbbbbbbbbbbb' },
        properties: {
          severity: 'medium',
          scanners: ['osv-scanner'],
          ruleIds: ['GHSA-aaaa-bbbb-cccc'],
          package: { name: 'requests', version: '2.0.0', manifest: 'requirements.txt' }
        }
      }
    ])
  })

  it('should list each rule once, sorted', () => {
    const log = toSarif(createMockVerdict({ groups: [lintGroup, dependencyGroup, lintGroup] }))

    expect(log.runs[0]?.tool.driver.rules.map(rule => rule.id)).toEqual(['CVE-2024-0001', 'CWE-89'])
  })

  it('should emit ungrouped findings without fingerprints', () => {
    const floating = createMockFinding({ scannerId: 'sonarqube', ruleId: 'python:S1', category: 'python:S1', location: undefined, fingerprint: null })

    const result = toSarif(createMockVerdict({ ungrouped: [floating] })).runs[0]?.results[0]

    expect(result?.partialFingerprints).toBeUndefined()
    expect(result?.locations[0]?.physicalLocation.artifactLocation.uri).toBe('.')
    expect(result?.properties).toEqual({ severity: 'high', scanners: ['sonarqube'], ruleIds: ['python:S1'] })
  })

  it('should report scanners that did not succeed as notifications', () => {
    const log = toSarif(createMockVerdict({
      exitCode: 2,
      scanners: [
        { scannerId: 'bandit', status: 'failed', required: true, exitCode: 2, duration: 10, attempts: 1, findingCount: 0, error: { kind: 'invocation', message: 'bandit exited with code 2: bad option' } },
        { scannerId: 'sonarqube', status: 'timed_out', required: false, exitCode: null, duration: 50, attempts: 1, findingCount: 0 },
        { scannerId: 'trivy', status: 'succeeded', required: false, exitCode: 0, duration: 10, attempts: 1, findingCount: 0 }
      ]
    }))

    expect(log.runs[0]?.invocations).toEqual([{
      executionSuccessful: false,
      exitCode: 2,
      toolExecutionNotifications: [
        { level: 'error', message: { text: 'bandit failed: bandit exited with code 2: bad option' }, descriptor: { id: 'bandit' } },
        { level: 'warning', message: { text: 'sonarqube timed_out' }, descriptor: { id: 'sonarqube' } }
      ]
    }])
  })

  it('should mask secrets in result messages', () => {
    const leaky = createMockGroup([createMockFinding({ message: 'Key AKIATESTTESTTEST0000' })])

    expect(toSarif(createMockVerdict({ groups: [leaky] })).runs[0]?.results[0]?.message.text)
      .toBe('Key AKIA********[MASKED]')
  })
})

describe('SarifReporter', () => {
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>

  beforeEach(() => {
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    mockWriteFile.mockClear()
  })

  afterEach(() => {
    stdoutWriteSpy.mockRestore()
  })

  it('should generate a parseable SARIF document', () => {
    const parsed: unknown = JSON.parse(new SarifReporter().generate(createMockVerdict({ groups: [lintGroup] })))

    expect(parsed).toMatchObject({ version: '2.1.0', runs: [{ results: [{ ruleId: 'CWE-89' }] }] })
  })

  it('should write to the output file', async () => {
    await createSarifReporter().write(createMockVerdict(), { output: '/tmp/report.sarif' })

    expect(mockWriteFile).toHaveBeenCalledWith('/tmp/report.sarif', expect.stringContaining('"version": "2.1.0"'), 'utf-8')
    expect(stdoutWriteSpy).not.toHaveBeenCalled()
  })
})
