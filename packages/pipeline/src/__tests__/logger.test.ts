import { describe, it, expect } from 'vitest'
import { createLogger } from '../logger'
import type { LogLevel } from '../logger'

function capture() {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = []
  const sink = (line: string, level: LogLevel) => {
    expect(line.endsWith('\n')).toBe(true)
    lines.push({ level, entry: JSON.parse(line) })
  }
  return { lines, sink }
}

describe('createLogger', () => {
  it('writes one JSON object per call with event and fields', () => {
    const { lines, sink } = capture()
    createLogger({ sink }).info('images_saved', { count: 3 })
    expect(lines).toHaveLength(1)
    expect(lines[0]?.level).toBe('info')
    expect(lines[0]?.entry).toMatchObject({ level: 'info', event: 'images_saved', count: 3 })
    expect(typeof lines[0]?.entry['ts']).toBe('string')
  })

  it('drops lines below the threshold', () => {
    const { lines, sink } = capture()
    const log = createLogger({ sink, level: 'warn' })
    log.debug('a')
    log.info('b')
    log.warn('c')
    log.error('d')
    expect(lines.map((l) => l.entry['event'])).toEqual(['c', 'd'])
  })

  it('child loggers carry their bindings', () => {
    const { lines, sink } = capture()
    const child = createLogger({ sink }).child({ runId: 'run-1' }).child({ component: 'masker' })
    child.warn('mask_retry', { attempt: 2 })
    expect(lines[0]?.entry).toMatchObject({ runId: 'run-1', component: 'masker', attempt: 2 })
  })

  it('serializes errors by name and message', () => {
    const { lines, sink } = capture()
    createLogger({ sink }).error('boom', { error: new RangeError('out of range') })
    expect(lines[0]?.level).toBe('error')
    expect(lines[0]?.entry['error']).toEqual({ name: 'RangeError', message: 'out of range' })
  })
})
