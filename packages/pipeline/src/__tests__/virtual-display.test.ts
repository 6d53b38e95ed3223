import { describe, it, expect } from 'vitest'
import { DisplayAllocator, openVirtualDisplay } from '../process/virtual-display'
import { silentLogger } from '../logger'
import { FakeRunner } from './fakes'

const free = (): DisplayAllocator => new DisplayAllocator(async () => false)
const options = { binary: 'Xvfb', display: ':99', startupMs: 0 }

describe('openVirtualDisplay', () => {
  it('starts the X server and exports DISPLAY', async () => {
    const runner = new FakeRunner()
    const session = await openVirtualDisplay(runner, { ...options, allocator: free() }, silentLogger)
    expect(session.mode).toBe('xvfb')
    expect(session.env).toEqual({ DISPLAY: ':99' })
    expect(runner.started[0]?.args).toEqual([':99', '-screen', '0', '1024x768x24'])
    await session.stop()
    expect(runner.stopped).toBe(1)
  })

  it('falls back to EGL when the server cannot be spawned', async () => {
    const runner = new FakeRunner()
    runner.startError = new Error('spawn Xvfb ENOENT')
    const session = await openVirtualDisplay(runner, { ...options, allocator: free() }, silentLogger)
    expect(session.mode).toBe('egl')
    expect(session.env).toEqual({ PYOPENGL_PLATFORM: 'egl' })
  })

  it('falls back to EGL when the server exits during startup', async () => {
    const runner = new FakeRunner()
    runner.exitOnStart = true
    const session = await openVirtualDisplay(runner, { ...options, allocator: free() }, silentLogger)
    expect(session.mode).toBe('egl')
    await session.stop()
    expect(runner.stopped).toBe(0)
  })

  it('gives overlapping sessions their own displays', async () => {
    const runner = new FakeRunner()
    const allocator = free()
    const [a, b] = await Promise.all([
      openVirtualDisplay(runner, { ...options, allocator }, silentLogger),
      openVirtualDisplay(runner, { ...options, allocator }, silentLogger),
    ])
    expect([a.env.DISPLAY, b.env.DISPLAY]).toEqual([':99', ':100'])

    await a.stop()
    const c = await openVirtualDisplay(runner, { ...options, allocator }, silentLogger)
    expect(c.env.DISPLAY).toBe(':99')
  })

  it('skips displays another X server holds', async () => {
    const runner = new FakeRunner()
    const allocator = new DisplayAllocator(async (n) => n === 99 || n === 100)
    const session = await openVirtualDisplay(runner, { ...options, allocator }, silentLogger)
    expect(session.env).toEqual({ DISPLAY: ':101' })
    expect(runner.started[0]?.args[0]).toBe(':101')
  })

  it('releases the display when the server cannot be spawned', async () => {
    const allocator = free()
    const broken = new FakeRunner()
    broken.startError = new Error('spawn Xvfb ENOENT')
    await openVirtualDisplay(broken, { ...options, allocator }, silentLogger)

    expect(await allocator.acquire(99)).toBe(99)
  })

  it('falls back to EGL when every display is busy', async () => {
    const allocator = new DisplayAllocator(async () => true, 3)
    await expect(allocator.acquire(99)).rejects.toThrow('No free X display in :99-:101')
    const session = await openVirtualDisplay(new FakeRunner(), { ...options, allocator }, silentLogger)
    expect(session.mode).toBe('egl')
  })
})
