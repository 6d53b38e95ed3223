import { spawn } from 'node:child_process'
import type { ChildProcess } from 'node:child_process'
import type { Logger } from '../logger'

/** One external command. */
export interface ProcessSpec {
  command: string
  args: readonly string[]
  cwd?: string
  /** Merged over the current environment. */
  env?: NodeJS.ProcessEnv
  /** Kill the process after this long. Unbounded when omitted. */
  timeoutMs?: number
  /** Short name used in logs and error messages. */
  label: string
}

export interface ProcessOutcome {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  durationMs: number
  timedOut: boolean
  /** Set when the process never started; the error text is kept verbatim. */
  spawnError?: string
}

/** A long-running helper process, e.g. a virtual display server. */
export interface BackgroundProcess {
  readonly label: string
  /** True once the process has exited on its own or been stopped. */
  readonly exited: boolean
  /** Terminate and wait for exit. Safe to call more than once. */
  stop(): Promise<void>
}

/**
 * Everything that shells out goes through this interface, so tests can swap
 * in a fake that writes the files a real tool would.
 */
export interface ProcessRunner {
  run(spec: ProcessSpec): Promise<ProcessOutcome>
  /** Start without waiting for exit. Rejects when the binary cannot be spawned. */
  start(spec: ProcessSpec): Promise<BackgroundProcess>
}

/** Captured output is capped so chatty tools cannot exhaust memory. */
const MAX_CAPTURE = 256 * 1024
const STOP_GRACE_MS = 2_000

function capped(current: string, chunk: Buffer): string {
  const next = current + chunk.toString()
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next
}

/** {@link ProcessRunner} on top of `child_process.spawn`. */
export class NodeProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(spec: ProcessSpec): Promise<ProcessOutcome> {
    const started = performance.now()
    this.logger.info('process_start', { label: spec.label, command: spec.command, args: spec.args })

    return new Promise((resolve) => {
      let stdout = ''
      let stderr = ''
      let timedOut = false
      let settled = false

      const finish = (outcome: Omit<ProcessOutcome, 'stdout' | 'stderr' | 'durationMs' | 'timedOut'>): void => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        const result: ProcessOutcome = {
          ...outcome,
          stdout,
          stderr,
          timedOut,
          durationMs: Math.round(performance.now() - started),
        }
        this.logger.info('process_exit', {
          label: spec.label,
          exitCode: result.exitCode,
          signal: result.signal,
          timedOut,
          ms: result.durationMs,
        })
        resolve(result)
      }

      const child = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      const timer = spec.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true
            child.kill('SIGKILL')
          }, spec.timeoutMs)
        : undefined

      child.stdout?.on('data', (data: Buffer) => {
        stdout = capped(stdout, data)
      })
      child.stderr?.on('data', (data: Buffer) => {
        stderr = capped(stderr, data)
      })

      child.on('error', (err: Error) => {
        this.logger.error('process_error', { label: spec.label, error: err.message })
        finish({ exitCode: null, signal: null, spawnError: err.message })
      })

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        finish({ exitCode: code, signal })
      })
    })
  }

  start(spec: ProcessSpec): Promise<BackgroundProcess> {
    return new Promise((resolve, reject) => {
      const child = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: spec.env ? { ...process.env, ...spec.env } : process.env,
        stdio: 'ignore',
      })

      child.once('error', (err: Error) => {
        this.logger.warn('process_spawn_failed', { label: spec.label, error: err.message })
        reject(err)
      })
      child.once('spawn', () => {
        this.logger.info('process_started', { label: spec.label, pid: child.pid })
        resolve(new ChildHandle(spec.label, child))
      })
    })
  }
}

class ChildHandle implements BackgroundProcess {
  private readonly closed: Promise<void>
  private done = false

  constructor(readonly label: string, private readonly child: ChildProcess) {
    this.closed = new Promise((resolve) => {
      child.once('exit', () => {
        this.done = true
        resolve()
      })
    })
  }

  get exited(): boolean {
    return this.done
  }

  async stop(): Promise<void> {
    if (this.done) return
    this.child.kill('SIGTERM')
    const killTimer = setTimeout(() => this.child.kill('SIGKILL'), STOP_GRACE_MS)
    try {
      await this.closed
    } finally {
      clearTimeout(killTimer)
    }
  }
}
