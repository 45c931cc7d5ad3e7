import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Finding } from '../../types/index.js'
import type { Logger } from '../../utils/logger.js'
import type { AdapterContext, AdapterOutput, AdapterSettings, ScannerAdapter } from '../adapter/base.js'
import { validateConfig, type Config } from '../config/schema.js'
import { AdapterCancelledError, ConfigurationError } from '../errors.js'
import { ScannerRegistry } from '../registry/index.js'
import { runPipeline } from './index.js'

const settings: AdapterSettings = {
  severityFloor: 'info',
  include: [],
  exclude: [],
  args: [],
  severityMap: { values: {}, fallback: 'medium' },
  categories: {}
}

const silentLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
}

function createConfig(overrides: Record<string, unknown> = {}): Config {
  return validateConfig({
    version: '1.0',
    name: 'test',
    required: ['bandit'],
    scanners: { bandit: {}, trivy: {} },
    severity_maps: { bandit: { values: {} }, trivy: { values: {} } },
    ...overrides
  })
}

function createFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    scannerId: 'bandit',
    ruleId: 'B608',
    category: 'CWE-89',
    severity: 'high',
    location: { file: 'app/db.py', line: 12 },
    message: 'Possible SQL injection',
    fingerprint: 'aaaaaaaaaaaaaaaa',
    raw: {},
    ...overrides
  }
}

function fakeAdapter(id: string, run: (context: AdapterContext) => Promise<AdapterOutput>): ScannerAdapter {
  return { id, name: id, family: 'lint', settings, run }
}

function reporting(id: string, findings: Finding[]): ScannerAdapter {
  return fakeAdapter(id, async () => ({ findings, exitCode: findings.length > 0 ? 1 : 0 }))
}

function createRegistry(...adapters: ScannerAdapter[]): ScannerRegistry {
  const registry = new ScannerRegistry()
  for (const adapter of adapters) {
    registry.register(adapter.id, adapter)
  }
  return registry
}

describe('runPipeline', () => {
  let targetDir: string

  beforeEach(() => {
    targetDir = mkdtempSync(join(tmpdir(), 'scanweave-pipeline-'))
  })

  afterEach(() => {
    rmSync(targetDir, { recursive: true, force: true })
  })

  it('should reject a target that is not a directory', async () => {
    const file = join(targetDir, 'app.py')
    writeFileSync(file, 'print("hello")\n')

    await expect(runPipeline(createConfig(), file, { registry: createRegistry(), logger: silentLogger }))
      .rejects.toThrow(`Scan target is not a directory: ${file}`)
  })

  it('should reject a run without scanners', async () => {
    const registry = createRegistry(reporting('bandit', []))

    await expect(runPipeline(createConfig({ required: [] }), targetDir, { registry, activation: { disable: ['bandit'] }, logger: silentLogger }))
      .rejects.toThrow('No scanners enabled')
  })

  it('should reject a run where a required scanner is not active', async () => {
    const registry = createRegistry(reporting('bandit', []), reporting('trivy', []))

    const run = runPipeline(createConfig(), targetDir, { registry, activation: { disable: ['bandit'] }, logger: silentLogger })

    await expect(run).rejects.toBeInstanceOf(ConfigurationError)
    await expect(run).rejects.toThrow('required: "bandit" is disabled')
  })

  it('should deduplicate findings across scanners into a verdict', async () => {
    const registry = createRegistry(
      reporting('trivy', [createFinding({ scannerId: 'trivy', ruleId: 'trivy-sqli' })]),
      reporting('bandit', [createFinding()])
    )

    const { verdict, results } = await runPipeline(createConfig(), targetDir, { registry, logger: silentLogger })

    expect(results.map(result => result.scannerId)).toEqual(['bandit', 'trivy'])
    expect(verdict.exitCode).toBe(1)
    expect(verdict.passed).toBe(false)
    expect(verdict.target).toBe(targetDir)
    expect(verdict.groups).toHaveLength(1)
    expect(verdict.groups[0]?.scanners).toEqual(['bandit', 'trivy'])
    expect(verdict.reasons).toEqual(['HIGH: CWE-89 at app/db.py:12 (bandit, trivy)'])
  })

  it('should pass a run whose findings are below the gate', async () => {
    const registry = createRegistry(reporting('bandit', [createFinding({ severity: 'low' })]), reporting('trivy', []))

    const { verdict } = await runPipeline(createConfig(), targetDir, { registry, logger: silentLogger })

    expect(verdict.exitCode).toBe(0)
    expect(verdict.totals.bySeverity.low).toBe(1)
  })

  it('should suppress findings matched by exceptions', async () => {
    const registry = createRegistry(
      reporting('bandit', [createFinding({ location: { file: 'tests/test_db.py', line: 3 } })]),
      reporting('trivy', [])
    )
    const config = createConfig({ exceptions: [{ pattern: 'tests/**', ignore: ['B608'] }] })

    const { verdict } = await runPipeline(config, targetDir, { registry, logger: silentLogger })

    expect(verdict.exitCode).toBe(0)
    expect(verdict.groups).toEqual([])
    expect(verdict.totals.suppressed).toBe(1)
    expect(verdict.reasons).toEqual(['1 finding(s) suppressed by exceptions'])
  })

  it('should apply per-scanner timeouts from the configuration', async () => {
    const hanging = fakeAdapter('bandit', context => new Promise((_resolve, reject) => {
      context.signal.addEventListener('abort', () => reject(new AdapterCancelledError('bandit', 'bandit stopped')))
    }))
    const registry = createRegistry(hanging, reporting('trivy', []))
    const config = createConfig({ scanners: { bandit: { timeout_ms: 50 }, trivy: {} } })

    const { verdict } = await runPipeline(config, targetDir, { registry, abortGraceMs: 100, logger: silentLogger })

    expect(verdict.exitCode).toBe(2)
    expect(verdict.scanners.find(scanner => scanner.scannerId === 'bandit')).toMatchObject({
      status: 'timed_out',
      error: { kind: 'timeout', message: 'Timed out after 50ms' }
    })
  })

  it('should fail a run interrupted by the caller', async () => {
    const waiting = (id: string) => fakeAdapter(id, context => new Promise((_resolve, reject) => {
      context.signal.addEventListener('abort', () => reject(new AdapterCancelledError(id, `${id} stopped`)))
    }))
    const registry = createRegistry(waiting('bandit'), waiting('trivy'))
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 30)

    const { verdict } = await runPipeline(createConfig({ required: [] }), targetDir, {
      registry,
      signal: controller.signal,
      logger: silentLogger
    })

    expect(verdict.exitCode).toBe(2)
    expect(verdict.passed).toBe(false)
    expect(verdict.scanners.map(scanner => scanner.status)).toEqual(['skipped', 'skipped'])
    expect(verdict.summary).toBe('ERROR: run cancelled (external) before every scanner finished')
    expect(verdict.reasons).toEqual(['Run cancelled (external)'])
  })
})
