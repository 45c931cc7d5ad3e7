import type { Severity } from '../../types/index.js'
import type { Config } from './schema.js'

/**
 * Per-run settings given on the command line
 */
export interface ConfigOverrides {
  failOn?: Severity
  required?: readonly string[]
  maxParallelism?: number
  adapterTimeoutMs?: number
  globalTimeoutMs?: number
  retries?: number
  failFast?: boolean
}

/**
 * Apply command-line overrides on top of a loaded configuration
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  return {
    ...config,
    gating: {
      ...config.gating,
      severity: overrides.failOn ?? config.gating.severity
    },
    orchestration: {
      ...config.orchestration,
      max_parallelism: overrides.maxParallelism ?? config.orchestration.max_parallelism,
      adapter_timeout_ms: overrides.adapterTimeoutMs ?? config.orchestration.adapter_timeout_ms,
      global_timeout_ms: overrides.globalTimeoutMs ?? config.orchestration.global_timeout_ms,
      retries: overrides.retries ?? config.orchestration.retries,
      fail_fast: overrides.failFast ?? config.orchestration.fail_fast
    },
    required: overrides.required ? [...overrides.required] : config.required
  }
}
