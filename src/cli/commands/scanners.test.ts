import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ExitCode } from '../index.js'
import { listScanners } from './scanners.js'

describe('scanners command', () => {
  let tempDir: string
  let stdoutWriteSpy: MockInstance<typeof process.stdout.write>
  let mockConsoleError: MockInstance<typeof console.error>

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'scanweave-scanners-'))
    stdoutWriteSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
    stdoutWriteSpy.mockRestore()
    mockConsoleError.mockRestore()
  })

  it('should print one aligned row per scanner', async () => {
    const configPath = join(tempDir, 'scanweave.config.yaml')
    writeFileSync(configPath, `
version: "1.0"
name: listing
required: [bandit]
scanners:
  bandit: {}
  trivy:
    enabled: false
severity_maps:
  bandit:
    values: { HIGH: high }
`)

    const exitCode = await listScanners({ config: configPath })

    expect(exitCode).toBe(ExitCode.PASSED)
    expect(stdoutWriteSpy.mock.calls).toEqual([
      ['bandit  bandit  enabled   required\n'],
      ['trivy   trivy   disabled\n']
    ])
  })

  it('should list the bundled default scanners without a configuration file', async () => {
    const exitCode = await listScanners({})

    expect(exitCode).toBe(ExitCode.PASSED)
    expect(stdoutWriteSpy.mock.calls).toEqual([
      ['bandit       bandit       enabled\n'],
      ['trivy        trivy        enabled\n'],
      ['osv-scanner  osv-scanner  enabled\n'],
      ['sonarqube    sonarqube    disabled\n']
    ])
  })

  it('should return ERROR (2) for an unreadable configuration', async () => {
    const exitCode = await listScanners({ config: join(tempDir, 'missing.yaml') })

    expect(exitCode).toBe(ExitCode.ERROR)
    expect(stdoutWriteSpy).not.toHaveBeenCalled()
    expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('Failed to list scanners: Failed to read configuration file'))
  })
})
