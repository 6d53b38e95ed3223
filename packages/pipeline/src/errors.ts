import type { ProcessOutcome } from './process/runner'

/**
 * Why an external process failed.
 *
 * - `spawn`: the binary could not be started (missing, not executable)
 * - `timeout`: killed after exceeding its time limit
 * - `device-mismatch`: a model mixed CPU and GPU tensors
 * - `signal`: terminated by a signal
 * - `exit`: ran to completion with a non-zero exit code
 */
export type ProcessErrorKind = 'spawn' | 'exit' | 'timeout' | 'device-mismatch' | 'signal'

const DEVICE_MISMATCH_MARKERS = [
  'Expected all tensors to be on the same device',
]

/** Classify an outcome; `undefined` means the process succeeded. */
export function classifyOutcome(outcome: ProcessOutcome): ProcessErrorKind | undefined {
  if (outcome.spawnError !== undefined) return 'spawn'
  if (outcome.timedOut) return 'timeout'
  if (outcome.exitCode === 0) return undefined
  if (DEVICE_MISMATCH_MARKERS.some((m) => outcome.stderr.includes(m))) return 'device-mismatch'
  if (outcome.signal !== null) return 'signal'
  return 'exit'
}

/** Failure of an external process, carrying what it printed. */
export class StageProcessError extends Error {
  readonly kind: ProcessErrorKind
  readonly label: string
  readonly exitCode: number | null
  readonly stderr: string

  constructor(label: string, kind: ProcessErrorKind, outcome: ProcessOutcome) {
    super(describeFailure(label, kind, outcome))
    this.name = 'StageProcessError'
    this.kind = kind
    this.label = label
    this.exitCode = outcome.exitCode
    this.stderr = outcome.stderr
  }

  /** Build an error for a failed outcome, or `undefined` when it succeeded. */
  static from(label: string, outcome: ProcessOutcome): StageProcessError | undefined {
    const kind = classifyOutcome(outcome)
    return kind === undefined ? undefined : new StageProcessError(label, kind, outcome)
  }
}

function describeFailure(label: string, kind: ProcessErrorKind, outcome: ProcessOutcome): string {
  switch (kind) {
    case 'spawn':
      return outcome.spawnError ?? `${label} could not be started`
    case 'timeout':
      return `${label} timed out after ${outcome.durationMs} ms`
    case 'signal':
      return `${label} was terminated by ${outcome.signal ?? 'a signal'}`
    case 'device-mismatch':
      return `${label} failed: tensors on mixed devices`
    case 'exit':
      return `${label} failed with exit code ${outcome.exitCode ?? 'unknown'}`
  }
}

/** Last non-empty lines of a process stream, for error messages. */
export function tail(text: string, lines = 20): string {
  return text
    .split(/\r?\n/)
    .filter((l) => l.trim() !== '')
    .slice(-lines)
    .join('\n')
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
