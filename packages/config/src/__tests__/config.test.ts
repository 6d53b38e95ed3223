import { describe, it, expect } from 'vitest'
import {
  createPipelineConfig,
  loadPipelineConfig,
  resolveFlags,
  DEFAULT_FLAGS,
  FEATURE_FLAG_KEYS,
} from '../index'

describe('resolveFlags', () => {
  it('falls back to defaults when the environment is empty', () => {
    expect(resolveFlags({})).toEqual(DEFAULT_FLAGS)
  })

  it('accepts 1/0 and true/false overrides', () => {
    const flags = resolveFlags({ RECON_CPU_ONLY: '1', RECON_BAKE_TEXTURE: 'false' })
    expect(flags.RECON_CPU_ONLY).toBe(true)
    expect(flags.RECON_BAKE_TEXTURE).toBe(false)
    expect(flags.RECON_MASK_FUSION).toBe(true)
  })

  it('resolves exactly the listed keys', () => {
    expect(Object.keys(DEFAULT_FLAGS).sort()).toEqual([...FEATURE_FLAG_KEYS].sort())
    const env = Object.fromEntries(FEATURE_FLAG_KEYS.map((k) => [k, '0']))
    expect(resolveFlags(env)).toEqual({ RECON_CPU_ONLY: false, RECON_BAKE_TEXTURE: false, RECON_MASK_FUSION: false })
  })

  it('ignores values it cannot read as booleans', () => {
    expect(resolveFlags({ RECON_CPU_ONLY: 'yes' }).RECON_CPU_ONLY).toBe(false)
  })
})

describe('createPipelineConfig', () => {
  it('fills every nested default', () => {
    const config = createPipelineConfig()
    expect(config.workRoot).toBe('/tmp/reconstruction')
    expect(config.engine).toBe('photogrammetry')
    expect(config.maxImages).toBe(5)
    expect(config.masking.maxRetries).toBe(3)
    expect(config.masking.timeoutMs).toBe(90_000)
    expect(config.masking.apiUrl).toBe('https://sdk.photoroom.com/v1/segment')
    expect(config.mesh.maxTriangles).toBe(100_000)
    expect(config.mesh.minDensePoints).toBe(100)
    expect(config.neural.display).toBe(':99')
  })

  it('keeps nested overrides next to nested defaults', () => {
    const config = createPipelineConfig({ mesh: { poissonDepth: 8 } })
    expect(config.mesh.poissonDepth).toBe(8)
    expect(config.mesh.densityQuantile).toBe(0.01)
  })

  it('rejects more than five images', () => {
    expect(() => createPipelineConfig({ maxImages: 6 })).toThrow()
  })
})

describe('loadPipelineConfig', () => {
  it('maps environment variables onto the config', () => {
    const config = loadPipelineConfig({
      WORK_DIR: '/data/runs',
      RECON_ENGINE: 'single-image',
      RECON_CPU_ONLY: 'true',
      PHOTOROOM_API_KEY: 'test-key',
      MASK_MAX_RETRIES: '5',
      COLMAP_BIN: '/opt/colmap/bin/colmap',
    })
    expect(config.workRoot).toBe('/data/runs')
    expect(config.engine).toBe('single-image')
    expect(config.cpuOnly).toBe(true)
    expect(config.masking.apiKey).toBe('test-key')
    expect(config.masking.maxRetries).toBe(5)
    expect(config.colmap.binary).toBe('/opt/colmap/bin/colmap')
  })

  it('treats empty strings as unset', () => {
    const config = loadPipelineConfig({ PHOTOROOM_API_KEY: '', WORK_DIR: '' })
    expect(config.masking.apiKey).toBeUndefined()
    expect(config.workRoot).toBe('/tmp/reconstruction')
  })

  it('throws on a non-numeric number', () => {
    expect(() => loadPipelineConfig({ MASK_TIMEOUT_MS: 'soon' })).toThrow(/MASK_TIMEOUT_MS/)
  })

  it('throws on an unknown engine', () => {
    expect(() => loadPipelineConfig({ RECON_ENGINE: 'lidar' })).toThrow()
  })
})
