import { spawn, type ChildProcess } from 'child_process'
import type { ScanDiagnostics } from '../../types/index.js'
import { createLogger } from '../../utils/logger.js'
import { errorCode } from '../errors.js'

const logger = createLogger('process')

/** Captured output beyond this is dropped and the result marked truncated */
const DEFAULT_MAX_OUTPUT_BYTES = 64 * 1024 * 1024

/** Time between SIGTERM and SIGKILL when terminating a process group */
const DEFAULT_KILL_GRACE_MS = 3000

/** Size of the output tail kept as diagnostics */
const DIAGNOSTICS_TAIL_CHARS = 4096

export interface RunProcessOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Terminate the process after this many milliseconds */
  timeoutMs?: number
  /** Terminate the process when this signal aborts */
  signal?: AbortSignal
  killGraceMs?: number
  maxOutputBytes?: number
}

export interface ProcessResult {
  exitCode: number | null
  /** Signal that ended the process, if any */
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  timedOut: boolean
  aborted: boolean
  truncated: boolean
  duration: number
}

/**
 * Collects chunks up to a byte budget
 */
class OutputBuffer {
  private chunks: Buffer[] = []
  private size = 0
  truncated = false

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.size >= this.limit) {
      this.truncated = true
      return
    }
    const room = this.limit - this.size
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk
    if (kept.length < chunk.length) {
      this.truncated = true
    }
    this.chunks.push(kept)
    this.size += kept.length
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8')
  }
}

// A detached child leads its own process group, so the whole tree can be signalled
const USE_PROCESS_GROUP = process.platform !== 'win32'

function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return
  }
  try {
    if (USE_PROCESS_GROUP) {
      process.kill(-child.pid, signal)
    } else {
      child.kill(signal)
    }
  } catch (err) {
    // ESRCH: the group already exited
    if (errorCode(err) !== 'ESRCH') {
      logger.warn(`Failed to send ${signal} to pid ${child.pid}: ${String(err)}`)
    }
  }
}

/**
 * Run a command to completion, capturing stdout and stderr.
 *
 * The process is started in its own process group. On timeout or abort the
 * group receives SIGTERM, then SIGKILL after `killGraceMs`, so no
 * descendants outlive the call. Rejects only when the process cannot be
 * spawned (for example ENOENT); non-zero exits resolve normally.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {}
): Promise<ProcessResult> {
  const start = Date.now()
  const maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      resolve({
        exitCode: null,
        signal: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        aborted: true,
        truncated: false,
        duration: 0
      })
      return
    }

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: USE_PROCESS_GROUP
    })

    const stdout = new OutputBuffer(maxOutputBytes)
    const stderr = new OutputBuffer(maxOutputBytes)
    let timedOut = false
    let aborted = false
    let terminating = false
    let settled = false
    let timeoutTimer: NodeJS.Timeout | undefined
    let killTimer: NodeJS.Timeout | undefined

    const terminate = () => {
      if (terminating) {
        return
      }
      terminating = true
      signalTree(child, 'SIGTERM')
      killTimer = setTimeout(() => signalTree(child, 'SIGKILL'), killGraceMs)
    }

    const onAbort = () => {
      aborted = true
      terminate()
    }

    const cleanup = () => {
      if (timeoutTimer) {
        clearTimeout(timeoutTimer)
      }
      if (killTimer) {
        clearTimeout(killTimer)
      }
      options.signal?.removeEventListener('abort', onAbort)
    }

    if (options.timeoutMs !== undefined) {
      timeoutTimer = setTimeout(() => {
        timedOut = true
        terminate()
      }, options.timeoutMs)
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk))

    child.on('error', err => {
      if (settled) {
        return
      }
      settled = true
      cleanup()
      reject(err)
    })

    child.on('close', (code, signal) => {
      if (settled) {
        return
      }
      settled = true
      cleanup()
      if (terminating) {
        // Sweep stragglers left in the group once the leader is gone
        signalTree(child, 'SIGKILL')
      }
      resolve({
        exitCode: code,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        aborted,
        truncated: stdout.truncated || stderr.truncated,
        duration: Date.now() - start
      })
    })
  })
}

/**
 * Keep the tail of captured output for a ScanResult
 */
export function toDiagnostics(output: { stdout: string; stderr: string }): ScanDiagnostics {
  return {
    stdout: output.stdout.slice(-DIAGNOSTICS_TAIL_CHARS),
    stderr: output.stderr.slice(-DIAGNOSTICS_TAIL_CHARS)
  }
}

/**
 * First non-empty line of a stream, for error messages
 */
export function firstLine(text: string): string {
  return text.split('\n').map(line => line.trim()).find(Boolean) ?? ''
}
