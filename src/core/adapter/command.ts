import type { Finding } from '../../types/index.js'
import {
  AdapterCancelledError,
  AdapterInvocationError,
  AdapterParseError,
  AdapterTransientError,
  errorCode
} from '../errors.js'
import type { AdapterContext, AdapterOutput, ScannerAdapter } from './base.js'
import { firstLine, runProcess, toDiagnostics, type ProcessResult } from './process.js'

/**
 * Native command line built by a command-based adapter
 */
export interface CommandInvocation {
  command: string
  args: string[]
  cwd: string
  env?: NodeJS.ProcessEnv
}

/**
 * How a tool's exit status is read.
 * `ok` includes "findings present" exit codes.
 */
export type ExitClass = 'ok' | 'transient' | 'failed'

/**
 * Capabilities of an adapter that wraps a command-line scanner
 */
export interface CommandAdapter extends ScannerAdapter {
  invoke(context: AdapterContext): CommandInvocation
  classifyExit(result: ProcessResult): ExitClass
  parse(stdout: string, context: AdapterContext, exitCode: number | null): Finding[]
}

function describeSpawnError(err: unknown, command: string): string {
  if (errorCode(err) === 'ENOENT') {
    return `Scanner binary not found: ${command}`
  }
  return `Failed to start ${command}: ${err instanceof Error ? err.message : String(err)}`
}

/**
 * Invoke, classify and parse one command-line scanner run
 */
export async function runCommand(
  adapter: CommandAdapter,
  context: AdapterContext
): Promise<AdapterOutput> {
  const invocation = adapter.invoke(context)

  let result: ProcessResult
  try {
    result = await runProcess(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env,
      signal: context.signal
    })
  } catch (err) {
    throw new AdapterInvocationError(adapter.id, describeSpawnError(err, invocation.command), {
      cause: err
    })
  }

  const details = { exitCode: result.exitCode, diagnostics: toDiagnostics(result) }

  if (result.aborted || result.timedOut) {
    throw new AdapterCancelledError(
      adapter.id,
      `${invocation.command} terminated before completion`,
      details
    )
  }

  const exitClass = adapter.classifyExit(result)
  if (exitClass !== 'ok') {
    const reason = firstLine(result.stderr) || `no output on stderr`
    const message = `${invocation.command} exited with code ${result.exitCode}: ${reason}`
    throw exitClass === 'transient'
      ? new AdapterTransientError(adapter.id, message, details)
      : new AdapterInvocationError(adapter.id, message, details)
  }

  if (result.truncated) {
    throw new AdapterParseError(adapter.id, 'Scanner output exceeded the capture limit', [], details)
  }

  let findings: Finding[]
  try {
    findings = adapter.parse(result.stdout, context, result.exitCode)
  } catch (err) {
    if (err instanceof AdapterParseError) {
      throw new AdapterParseError(adapter.id, err.message, err.partial, details)
    }
    throw new AdapterParseError(
      adapter.id,
      `Unparseable output: ${err instanceof Error ? err.message : String(err)}`,
      [],
      { ...details, cause: err }
    )
  }

  return { findings, exitCode: result.exitCode }
}
