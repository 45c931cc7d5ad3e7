import { z } from 'zod'

/**
 * Unified severity levels
 */
export const SeveritySchema = z.enum(['critical', 'high', 'medium', 'low', 'info'])

/**
 * Scanner families with a built-in adapter
 */
export const ScannerTypeSchema = z.enum(['bandit', 'trivy', 'osv-scanner', 'sonarqube'])
export type ScannerType = z.infer<typeof ScannerTypeSchema>

const GlobListSchema = z.array(z.string().min(1, 'Glob must not be empty'))

/**
 * Native severity vocabulary of one scanner type
 */
export const SeverityMapSchema = z.object({
  values: z.record(z.string(), SeveritySchema)
    .describe('Native severity value to unified severity'),
  fallback: SeveritySchema
    .default('medium')
    .describe('Severity for native values missing from the table')
})

export type SeverityMapConfig = z.infer<typeof SeverityMapSchema>

/**
 * One scanner entry
 */
export const ScannerConfigSchema = z.object({
  type: ScannerTypeSchema
    .optional()
    .describe('Adapter to use; defaults to the scanner id'),
  enabled: z.boolean()
    .default(true)
    .describe('Whether the scanner runs by default'),
  binary: z.string()
    .min(1)
    .optional()
    .describe('Executable name or path for command-line scanners'),
  timeout_ms: z.number()
    .int()
    .positive('Timeout must be positive')
    .optional()
    .describe('Per-scanner timeout overriding orchestration.adapter_timeout_ms'),
  severity_floor: SeveritySchema
    .default('info')
    .describe('Findings below this severity are dropped'),
  include: GlobListSchema
    .default([])
    .describe('Only keep findings in files matching these globs'),
  exclude: GlobListSchema
    .default([])
    .describe('Drop findings in files matching these globs'),
  args: z.array(z.string())
    .default([])
    .describe('Extra native arguments'),
  server_url: z.string()
    .url('Server URL must be a valid URL')
    .optional()
    .describe('Quality server base URL'),
  project_key: z.string()
    .min(1)
    .optional()
    .describe('Quality server project key'),
  token_env: z.string()
    .min(1)
    .optional()
    .describe('Environment variable holding the quality server token'),
  issue_types: z.array(z.string().min(1))
    .default(['VULNERABILITY', 'BUG'])
    .describe('Quality server issue types to fetch')
})

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>

/**
 * Gate configuration
 */
export const GatingSchema = z.object({
  severity: SeveritySchema
    .default('high')
    .describe('Findings at or above this severity fail the gate'),
  fail_on_required_scanner_failure: z.boolean()
    .default(true)
    .describe('Whether a required scanner that did not succeed fails the run')
})

/**
 * Orchestration limits
 */
export const OrchestrationSchema = z.object({
  global_timeout_ms: z.number()
    .int()
    .positive('Global timeout must be positive')
    .default(900_000)
    .describe('Upper bound on the whole run'),
  adapter_timeout_ms: z.number()
    .int()
    .positive('Adapter timeout must be positive')
    .default(300_000)
    .describe('Default per-attempt timeout'),
  max_parallelism: z.number()
    .int()
    .min(0, 'Parallelism must be >= 0')
    .default(0)
    .describe('Concurrent adapters (0 = all at once)'),
  retries: z.number()
    .int()
    .min(0, 'Retries must be >= 0')
    .max(5, 'Retries must be <= 5')
    .default(1)
    .describe('Extra attempts for transient failures'),
  retry_delay_ms: z.number()
    .int()
    .min(0)
    .default(1000)
    .describe('Base delay of the exponential retry backoff'),
  fail_fast: z.boolean()
    .default(false)
    .describe('Cancel outstanding scanners when a required scanner fails')
})

/**
 * Finding suppression
 */
export const ExceptionSchema = z.object({
  pattern: z.string()
    .min(1, 'Pattern is required')
    .describe('Glob pattern to match files'),
  ignore: z.array(z.string())
    .min(1, 'At least one rule to ignore is required')
    .describe('Rule ids or categories to ignore for matched files'),
  reason: z.string()
    .optional()
    .describe('Explanation for this exception')
})

export type Exception = z.infer<typeof ExceptionSchema>

/**
 * Complete configuration file
 */
export const ConfigSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Configuration version in semver format'),

  name: z.string()
    .min(1, 'Configuration name is required')
    .max(50, 'Configuration name too long')
    .describe('Identifier for this configuration'),

  description: z.string()
    .optional(),

  extends: z.string()
    .optional()
    .describe('Base configuration to extend'),

  target: z.string()
    .default('.')
    .describe('Directory to scan, relative to the configuration file'),

  gating: GatingSchema.default({}),

  orchestration: OrchestrationSchema.default({}),

  required: z.array(z.string())
    .default([])
    .describe('Scanners whose failure makes the run an infrastructure error'),

  scanners: z.record(z.string(), ScannerConfigSchema)
    .describe('Scanner entries keyed by scanner id'),

  severity_maps: z.record(z.string(), SeverityMapSchema)
    .default({})
    .describe('Severity maps keyed by scanner type'),

  categories: z.record(z.string(), z.string().min(1))
    .default({})
    .describe('Rule id to category overrides used for fingerprinting'),

  exceptions: z.array(ExceptionSchema)
    .default([])
    .describe('File-specific finding suppressions')
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Adapter type of a scanner entry
 */
export function scannerType(id: string, scanner: ScannerConfig): ScannerType | undefined {
  if (scanner.type) {
    return scanner.type
  }
  const parsed = ScannerTypeSchema.safeParse(id)
  return parsed.success ? parsed.data : undefined
}

/**
 * Checks that span several sections of a schema-valid configuration
 */
export function validateConfigSemantics(config: Config): string[] {
  const issues: string[] = []

  for (const [id, scanner] of Object.entries(config.scanners)) {
    const type = scannerType(id, scanner)
    if (!type) {
      issues.push(`scanners.${id}: unknown scanner type; set "type" to one of ${ScannerTypeSchema.options.join(', ')}`)
      continue
    }
    if (!scanner.enabled) {
      continue
    }
    if (!config.severity_maps[type]) {
      issues.push(`severity_maps.${type}: missing severity map for enabled scanner "${id}"`)
    }
    if (type === 'sonarqube' && (!scanner.server_url || !scanner.project_key)) {
      issues.push(`scanners.${id}: server_url and project_key are required`)
    }
  }

  for (const id of config.required) {
    const scanner = config.scanners[id]
    if (!scanner) {
      issues.push(`required: unknown scanner "${id}"`)
    } else if (!scanner.enabled) {
      issues.push(`required: scanner "${id}" is disabled`)
    }
  }

  return issues
}

/**
 * Validate configuration content
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data)
}

/**
 * Validate configuration with detailed errors
 */
export function validateConfigSafe(data: unknown):
  | { success: true; data: Config }
  | { success: false; errors: z.ZodError } {
  const result = ConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}
