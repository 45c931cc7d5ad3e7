export type * from './types/index.js'
export * from './core/errors.js'
export * from './core/adapter/index.js'
export { ScannerRegistry, createRegistry } from './core/registry/index.js'
export type { ActivationOverrides, AdapterProvider, RegistryEntry } from './core/registry/index.js'
export { Orchestrator, createOrchestrator } from './core/orchestrator/index.js'
export type { OrchestrationResult, OrchestratorOptions } from './core/orchestrator/index.js'
export * from './core/normalizer/index.js'
export { ExitCodes, VerdictBuilder, buildVerdict, createVerdictBuilder, describeTarget, sortGroups } from './core/verdict/index.js'
export type { GatingOptions, VerdictInput } from './core/verdict/index.js'
export { runPipeline } from './core/pipeline/index.js'
export type { PipelineOptions, PipelineRun } from './core/pipeline/index.js'
export { ConfigLoader, createConfigLoader } from './core/config/loader.js'
export { applyOverrides } from './core/config/overrides.js'
export type { ConfigOverrides } from './core/config/overrides.js'
export { ConfigSchema, validateConfig } from './core/config/schema.js'
export type { Config, ScannerConfig, ScannerType } from './core/config/schema.js'
export * from './core/reporter/index.js'
