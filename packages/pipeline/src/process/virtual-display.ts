import { access } from 'node:fs/promises'
import { setTimeout as sleep } from 'node:timers/promises'
import type { Logger } from '../logger'
import { errorMessage } from '../errors'
import { isNotFound } from '../workspace/layout'
import type { BackgroundProcess, ProcessRunner } from './runner'

export interface VirtualDisplayOptions {
  binary: string
  /** First X display tried, e.g. `:99`; later numbers are used while it is busy. */
  display: string
  /** Wait after spawning before the display is used. */
  startupMs: number
  allocator?: DisplayAllocator
}

/** An X server holds `/tmp/.X<n>-lock` while display `:n` is in use. */
async function xLockExists(display: number): Promise<boolean> {
  try {
    await access(`/tmp/.X${display}-lock`)
    return true
  } catch (err) {
    return !isNotFound(err)
  }
}

/**
 * Hands out X display numbers so concurrent model runs never share a server.
 *
 * Numbers leased in this process are skipped, as are numbers another X
 * server has locked.
 */
export class DisplayAllocator {
  private readonly leased = new Set<number>()

  constructor(
    private readonly isTaken: (display: number) => Promise<boolean> = xLockExists,
    private readonly span = 100,
  ) {}

  async acquire(base: number): Promise<number> {
    for (let n = base; n < base + this.span; n++) {
      if (this.leased.has(n)) continue
      // Reserved before the lock check so a concurrent caller skips it.
      this.leased.add(n)
      if (!(await this.isTaken(n))) return n
      this.leased.delete(n)
    }
    throw new Error(`No free X display in :${base}-:${base + this.span - 1}`)
  }

  release(display: number): void {
    this.leased.delete(display)
  }
}

const sharedAllocator = new DisplayAllocator()

/**
 * Off-screen rendering context for one model invocation.
 *
 * `env` holds the variables the model process needs: `DISPLAY` when an X
 * server is running, `PYOPENGL_PLATFORM=egl` when none could be started.
 */
export interface DisplaySession {
  mode: 'xvfb' | 'egl'
  env: NodeJS.ProcessEnv
  stop(): Promise<void>
}

/** Start Xvfb on a free display, falling back to EGL when it cannot be spawned or dies at once. */
export async function openVirtualDisplay(
  runner: ProcessRunner,
  options: VirtualDisplayOptions,
  logger: Logger,
): Promise<DisplaySession> {
  const allocator = options.allocator ?? sharedAllocator
  let number: number
  try {
    number = await allocator.acquire(Number(options.display.slice(1)))
  } catch (err) {
    logger.warn('display_fallback_egl', { reason: errorMessage(err) })
    return eglSession()
  }
  const display = `:${number}`

  let server: BackgroundProcess
  try {
    server = await runner.start({
      command: options.binary,
      args: [display, '-screen', '0', '1024x768x24'],
      label: 'xvfb',
    })
  } catch (err) {
    allocator.release(number)
    logger.warn('display_fallback_egl', { reason: errorMessage(err) })
    return eglSession()
  }

  if (options.startupMs > 0) await sleep(options.startupMs)

  if (server.exited) {
    allocator.release(number)
    logger.warn('display_fallback_egl', { reason: 'Xvfb exited during startup' })
    return eglSession()
  }

  logger.info('display_started', { display })
  return {
    mode: 'xvfb',
    env: { DISPLAY: display },
    stop: async () => {
      try {
        await server.stop()
      } finally {
        allocator.release(number)
      }
      logger.info('display_stopped', { display })
    },
  }
}

function eglSession(): DisplaySession {
  return {
    mode: 'egl',
    env: { PYOPENGL_PLATFORM: 'egl' },
    stop: () => Promise.resolve(),
  }
}
