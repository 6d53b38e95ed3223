import { describe, it, expect } from 'vitest'
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createPipelineConfig } from '@photomesh/config'
import { silentLogger } from '@photomesh/pipeline'
import type { PipelineInput } from '@photomesh/pipeline'
import type { PipelineReport } from '@photomesh/types'
import { createApp } from '../app'
import { pipelineInputOf } from '../routes/generate'
import type { AppDeps } from '../app'

/**
 * HTTP surface against a stand-in pipeline: routing, form handling,
 * middleware and downloads. No external tools run.
 */

function report(overrides: Partial<PipelineReport> = {}): PipelineReport {
  return {
    runId: 'run-1',
    success: true,
    branch: 'sparse',
    maskSource: 'none',
    workDirectory: '/work/request_run-1',
    imagesSaved: 1,
    binaryMasks: 0,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
    stages: {},
    artifacts: { files: [] },
    ...overrides,
  }
}

async function build(overrides: Partial<AppDeps> & { result?: PipelineReport | Error } = {}) {
  const workRoot = await mkdtemp(join(tmpdir(), 'photomesh-server-'))
  const inputs: PipelineInput[] = []
  const { result = report(), ...rest } = overrides
  const app = createApp({
    pipeline: {
      branch: 'sparse',
      run: async (input) => {
        inputs.push(input)
        if (result instanceof Error) throw result
        return result
      },
    },
    config: createPipelineConfig({ workRoot, cpuOnly: true }),
    logger: silentLogger,
    corsOrigins: ['http://localhost:3000'],
    production: false,
    ...rest,
  })
  return { app, inputs, workRoot }
}

function imageForm(count: number, fields: Record<string, string> = {}): FormData {
  const form = new FormData()
  for (let i = 0; i < count; i++) {
    form.append('files', new Blob([`image-${i}`], { type: 'image/jpeg' }), `photo${i}.jpg`)
  }
  for (const [key, value] of Object.entries(fields)) form.append(key, value)
  return form
}

// ─── Info endpoints ─────────────────────────────────────────────────────────

describe('info endpoints', () => {
  it('GET / identifies the service', async () => {
    const { app } = await build()
    const res = await app.request('/')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ name: 'photomesh', version: '0.1.0', status: 'online' })
  })

  it('GET /health reports the configured branch', async () => {
    const { app } = await build()
    const res = await app.request('/health')
    expect(await res.json()).toEqual({
      status: 'healthy',
      engine: 'photogrammetry',
      branch: 'sparse',
      cpuOnly: true,
      maskingConfigured: false,
    })
  })

  it('answers unknown paths with JSON 404', async () => {
    const { app } = await build()
    const res = await app.request('/nope')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Not found.' })
  })

  it('sets security and CORS headers', async () => {
    const { app } = await build()
    const res = await app.request('/', { headers: { Origin: 'http://localhost:3000' } })
    expect(res.headers.get('x-content-type-options')).toBe('nosniff')
    expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:3000')
    expect(res.headers.get('strict-transport-security')).toBeNull()
  })
})

// ─── POST /generate ─────────────────────────────────────────────────────────

describe('POST /generate', () => {
  it('rejects a request without files', async () => {
    const { app, inputs } = await build()
    const res = await app.request('/generate', { method: 'POST', body: imageForm(0, { include_files: 'true' }) })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'No files uploaded.' })
    expect(inputs).toHaveLength(0)
  })

  it('passes up to five images to the pipeline in order', async () => {
    const { app, inputs } = await build()
    const res = await app.request('/generate', { method: 'POST', body: imageForm(6) })

    expect(res.status).toBe(200)
    const [input] = inputs
    expect(input?.images).toHaveLength(5)
    expect(Buffer.from(input?.images[4] ?? []).toString()).toBe('image-4')
    expect(input?.apiKey).toBeUndefined()
    expect(input?.includeFiles).toBe(false)
    expect(input?.masks).toBeUndefined()

    expect(await res.json()).toMatchObject({
      status: 'success',
      filesReceived: 5,
      apiKeyPresent: false,
      fileInfo: expect.arrayContaining([{ filename: 'photo0.jpg', size: 7, contentType: 'image/jpeg' }]),
      pipelineResult: { runId: 'run-1', success: true },
    })
  })

  it('forwards the key, the file flag and supplied masks', async () => {
    const { app, inputs } = await build()
    const form = imageForm(2, { photoroom_api_key: ' test-key ', include_files: 'on' })
    form.append('masks', new Blob(['mask'], { type: 'image/png' }), 'mask0.png')

    const res = await app.request('/generate', { method: 'POST', body: form })

    expect(inputs[0]?.apiKey).toBe('test-key')
    expect(inputs[0]?.includeFiles).toBe(true)
    expect(inputs[0]?.masks).toHaveLength(1)
    expect(await res.json()).toMatchObject({ apiKeyPresent: true })
  })

  it('leaves masks unset when none were uploaded', () => {
    const image = new Uint8Array([1])
    expect(pipelineInputOf({ photoroom_api_key: undefined, include_files: false }, [image], [])).toEqual({
      images: [image],
      masks: undefined,
      apiKey: undefined,
      includeFiles: false,
    })
  })

  it('reports a failed run as status error with HTTP 200', async () => {
    const { app } = await build({ result: report({ success: false, stage: 'mapping', error: 'no model' }) })
    const res = await app.request('/generate', { method: 'POST', body: imageForm(1) })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: 'error', pipelineResult: { stage: 'mapping' } })
  })

  it('maps an unexpected pipeline error to 500', async () => {
    const { app } = await build({ result: new Error('disk full') })
    const res = await app.request('/generate', { method: 'POST', body: imageForm(1) })
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error.' })
  })

  it('is rate limited', async () => {
    const { app } = await build({ generateLimit: { windowMs: 60_000, max: 1 } })
    expect((await app.request('/generate', { method: 'POST', body: imageForm(1) })).status).toBe(200)
    expect((await app.request('/generate', { method: 'POST', body: imageForm(1) })).status).toBe(429)
  })
})

// ─── GET /download/:filename ────────────────────────────────────────────────

describe('GET /download/:filename', () => {
  it('serves a file from a run output directory', async () => {
    const { app, workRoot } = await build()
    const dir = join(workRoot, 'request_a', 'output', '0')
    await mkdir(dir, { recursive: true })
    await writeFile(join(dir, 'mesh.glb'), 'model')

    const res = await app.request('/download/mesh.glb')

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/octet-stream')
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="mesh.glb"')
    expect(await res.text()).toBe('model')
  })

  it('ignores files outside output directories', async () => {
    const { app, workRoot } = await build()
    await mkdir(join(workRoot, 'request_a', 'images'), { recursive: true })
    await writeFile(join(workRoot, 'request_a', 'images', 'image_000.jpg'), 'x')

    const res = await app.request('/download/image_000.jpg')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'File not found.' })
  })

  it('rejects names that are not bare file names', async () => {
    const { app } = await build()
    const res = await app.request('/download/mesh%20final.glb')
    expect(res.status).toBe(400)
  })
})
