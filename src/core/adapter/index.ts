import { ConfigurationError } from '../errors.js'
import type { Config, ScannerConfig, ScannerType } from '../config/schema.js'
import type { AdapterSettings, ScannerAdapter } from './base.js'
import { BanditAdapter } from './bandit.js'
import { OsvScannerAdapter } from './osv.js'
import { SonarQubeAdapter } from './sonarqube.js'
import { TrivyAdapter } from './trivy.js'

export * from './base.js'
export { runCommand } from './command.js'
export type { CommandAdapter, CommandInvocation, ExitClass } from './command.js'
export { createFinding, filterFindings, mapSeverity } from './finding.js'
export type { FindingInput } from './finding.js'
export { BanditAdapter } from './bandit.js'
export { TrivyAdapter } from './trivy.js'
export { OsvScannerAdapter } from './osv.js'
export { SonarQubeAdapter } from './sonarqube.js'
export type { HttpInvocation, SonarQubeOptions } from './sonarqube.js'

export type AdapterFactory = (
  id: string,
  settings: AdapterSettings,
  scanner: ScannerConfig
) => ScannerAdapter

/**
 * Built-in adapter per scanner type
 */
export const adapterFactories: Record<ScannerType, AdapterFactory> = {
  bandit: (id, settings) => new BanditAdapter(id, settings),
  trivy: (id, settings) => new TrivyAdapter(id, settings),
  'osv-scanner': (id, settings) => new OsvScannerAdapter(id, settings),
  sonarqube: (id, settings, scanner) => {
    if (!scanner.server_url || !scanner.project_key) {
      throw new ConfigurationError(`Scanner "${id}" needs server_url and project_key`)
    }
    return new SonarQubeAdapter(id, settings, {
      serverUrl: scanner.server_url,
      projectKey: scanner.project_key,
      tokenEnv: scanner.token_env,
      issueTypes: scanner.issue_types
    })
  }
}

/**
 * Declarative adapter settings for one scanner entry
 */
export function adapterSettings(
  config: Config,
  id: string,
  type: ScannerType
): AdapterSettings {
  const scanner = config.scanners[id]
  const severityMap = config.severity_maps[type]
  if (!scanner) {
    throw new ConfigurationError(`Unknown scanner "${id}"`)
  }
  if (!severityMap) {
    throw new ConfigurationError(`Missing severity map for scanner type "${type}"`)
  }

  return {
    binary: scanner.binary,
    severityFloor: scanner.severity_floor,
    include: scanner.include,
    exclude: scanner.exclude,
    args: scanner.args,
    severityMap,
    categories: config.categories
  }
}
