import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ConfigurationError } from '../errors.js'
import { ConfigLoader, DEFAULT_CONFIG_PATH, createConfigLoader, mergeRawConfig } from './loader.js'

const BASE_CONFIG = `
version: "1.0"
name: base
gating:
  severity: high
orchestration:
  retries: 2
required:
  - bandit
scanners:
  bandit:
    severity_floor: low
  trivy:
    enabled: true
severity_maps:
  bandit:
    values: { HIGH: high, MEDIUM: medium, LOW: low }
  trivy:
    values: { CRITICAL: critical, HIGH: high }
categories:
  B608: CWE-89
exceptions:
  - pattern: "tests/**"
    ignore: [B101]
`

describe('mergeRawConfig', () => {
  it('should merge sections key by key and scanner entries field by field', () => {
    const merged = mergeRawConfig(
      {
        name: 'base',
        gating: { severity: 'high', fail_on_required_scanner_failure: true },
        scanners: { bandit: { severity_floor: 'low', exclude: ['**/tests/**'] }, trivy: {} },
        required: ['bandit'],
        exceptions: [{ pattern: 'a/**', ignore: ['X'] }]
      },
      {
        name: 'child',
        gating: { severity: 'critical' },
        scanners: { bandit: { severity_floor: 'medium' } },
        required: ['bandit', 'trivy'],
        exceptions: [{ pattern: 'b/**', ignore: ['Y'] }]
      }
    )

    expect(merged).toEqual({
      name: 'child',
      gating: { severity: 'critical', fail_on_required_scanner_failure: true },
      scanners: { bandit: { severity_floor: 'medium', exclude: ['**/tests/**'] }, trivy: {} },
      required: ['bandit', 'trivy'],
      exceptions: [{ pattern: 'a/**', ignore: ['X'] }, { pattern: 'b/**', ignore: ['Y'] }]
    })
  })
})

describe('ConfigLoader', () => {
  let dir: string
  let loader: ConfigLoader

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scanweave-config-'))
    loader = new ConfigLoader({ basePath: dir })
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  describe('load', () => {
    it('loads a valid configuration file', async () => {
      writeFileSync(join(dir, 'scanweave.config.yaml'), BASE_CONFIG)

      const config = await loader.load('scanweave.config.yaml')

      expect(config.name).toBe('base')
      expect(config.orchestration.retries).toBe(2)
      expect(config.orchestration.max_parallelism).toBe(0)
      expect(config.scanners.bandit?.severity_floor).toBe('low')
      expect(config.severity_maps.bandit?.fallback).toBe('medium')
      expect(config.exceptions).toEqual([{ pattern: 'tests/**', ignore: ['B101'] }])
    })

    it('throws ConfigurationError for a missing file', async () => {
      await expect(loader.load('missing.yaml')).rejects.toThrow(ConfigurationError)
    })

    it('throws ConfigurationError for invalid YAML', async () => {
      writeFileSync(join(dir, 'broken.yaml'), 'name: [unclosed')

      await expect(loader.load('broken.yaml')).rejects.toThrow(/^Invalid YAML in /)
    })

    it('throws ConfigurationError for a document that is not a mapping', async () => {
      writeFileSync(join(dir, 'list.yaml'), '- one\n- two\n')

      await expect(loader.load('list.yaml')).rejects.toThrow(/^Configuration must be a YAML mapping/)
    })

    it('lists every schema issue', async () => {
      writeFileSync(join(dir, 'invalid.yaml'), 'version: one\nname: ""\nscanners: {}\n')

      try {
        await loader.load('invalid.yaml')
        expect.fail('Should have thrown')
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError)
        if (error instanceof ConfigurationError) {
          expect(error.issues).toEqual([
            'version: Version must be semver format',
            'name: Configuration name is required'
          ])
          expect(error.configPath).toBe(join(dir, 'invalid.yaml'))
        }
      }
    })

    it('rejects semantic problems before any scanner runs', async () => {
      writeFileSync(join(dir, 'required.yaml'), `
version: "1.0"
name: required
required: [trivy]
scanners:
  trivy:
    enabled: false
`)

      await expect(loader.load('required.yaml')).rejects.toMatchObject({
        issues: ['required: scanner "trivy" is disabled']
      })
    })

    it('caches loaded configurations', async () => {
      writeFileSync(join(dir, 'scanweave.config.yaml'), BASE_CONFIG)

      const first = await loader.load('scanweave.config.yaml')
      const second = await loader.load('scanweave.config.yaml')
      loader.clearCache()
      const third = await loader.load('scanweave.config.yaml')

      expect(second).toBe(first)
      expect(third).not.toBe(first)
      expect(third).toEqual(first)
    })
  })

  describe('extends', () => {
    it('merges a configuration over its base', async () => {
      writeFileSync(join(dir, 'base.yaml'), BASE_CONFIG)
      writeFileSync(join(dir, 'child.yaml'), `
version: "1.0"
name: child
extends: ./base.yaml
gating:
  severity: critical
scanners:
  bandit:
    exclude: ["**/migrations/**"]
exceptions:
  - pattern: "docs/**"
    ignore: [B105]
`)

      const config = await loader.load('child.yaml')

      expect(config.name).toBe('child')
      expect(config.gating.severity).toBe('critical')
      expect(config.orchestration.retries).toBe(2)
      expect(config.required).toEqual(['bandit'])
      expect(config.scanners.bandit).toMatchObject({ severity_floor: 'low', exclude: ['**/migrations/**'] })
      expect(config.categories).toEqual({ B608: 'CWE-89' })
      expect(config.exceptions.map(e => e.pattern)).toEqual(['tests/**', 'docs/**'])
    })

    it('extends the bundled default by name', async () => {
      writeFileSync(join(dir, 'child.yaml'), `
version: "1.0"
name: child
extends: default
gating:
  severity: medium
`)

      const config = await loader.load('child.yaml')

      expect(config.gating.severity).toBe('medium')
      expect(Object.keys(config.scanners)).toEqual(['bandit', 'trivy', 'osv-scanner', 'sonarqube'])
      expect(config.categories.B608).toBe('CWE-89')
    })

    it('detects circular extends', async () => {
      writeFileSync(join(dir, 'a.yaml'), 'version: "1.0"\nname: a\nextends: ./b.yaml\nscanners: {}\n')
      writeFileSync(join(dir, 'b.yaml'), 'version: "1.0"\nname: b\nextends: ./a.yaml\nscanners: {}\n')

      await expect(loader.load('a.yaml')).rejects.toThrow(/^Circular extends/)
    })

    it('ignores extends when disabled', async () => {
      writeFileSync(join(dir, 'child.yaml'), 'version: "1.0"\nname: child\nextends: ./missing.yaml\nscanners: {}\n')
      const isolated = createConfigLoader({ basePath: dir, allowExtends: false })

      const config = await isolated.load('child.yaml')

      expect(config.scanners).toEqual({})
    })
  })

  describe('loadDefault', () => {
    it('loads the bundled default configuration', async () => {
      const config = await loader.loadDefault()

      expect(config.name).toBe('default')
      expect(config.scanners.sonarqube?.enabled).toBe(false)
      expect(config.scanners.bandit?.exclude).toEqual(['**/tests/**', '**/.venv/**'])
      expect(config.severity_maps['osv-scanner']?.values.MODERATE).toBe('medium')
      expect(DEFAULT_CONFIG_PATH.endsWith(join('config', 'default.yaml'))).toBe(true)
    })
  })

  describe('loadFromString', () => {
    it('parses configuration content', () => {
      const config = loader.loadFromString(BASE_CONFIG)

      expect(config.name).toBe('base')
    })

    it('does not follow extends', () => {
      const config = loader.loadFromString('version: "1.0"\nname: child\nextends: ./base.yaml\nscanners: {}\n')

      expect(config.extends).toBe('./base.yaml')
      expect(config.scanners).toEqual({})
    })
  })

  describe('validate', () => {
    it('returns valid for a correct file', async () => {
      writeFileSync(join(dir, 'scanweave.config.yaml'), BASE_CONFIG)

      expect(await loader.validate('scanweave.config.yaml')).toEqual({ valid: true, errors: [] })
    })

    it('returns the issues of an invalid file', async () => {
      writeFileSync(join(dir, 'invalid.yaml'), 'version: "1.0"\nname: x\nscanners:\n  semgrep: {}\n')

      expect(await loader.validate('invalid.yaml')).toEqual({
        valid: false,
        errors: ['scanners.semgrep: unknown scanner type; set "type" to one of bandit, trivy, osv-scanner, sonarqube']
      })
    })

    it('returns the message when there are no issues to list', async () => {
      writeFileSync(join(dir, 'list.yaml'), '- one\n')

      const result = await loader.validate('list.yaml')

      expect(result.valid).toBe(false)
      expect(result.errors).toEqual([`Configuration must be a YAML mapping: ${join(dir, 'list.yaml')}`])
    })
  })
})
