import { describe, it, expect } from 'vitest'
import { readdir, stat, truncate } from 'node:fs/promises'
import { join } from 'node:path'
import { ReconstructionStageRunner, RELAXED_MAPPER_ARGS, inspectPointCloud } from '../reconstruction/stage-runner'
import { WorkspaceLayout } from '../workspace/layout'
import { silentLogger } from '../logger'
import { FakeRunner, argValue, jpegImage, pngImage, simulateTools, tempDir, testConfig, writePointCloud } from './fakes'

async function setup(runner = simulateTools(new FakeRunner())) {
  const root = await tempDir()
  const layout = new WorkspaceLayout(join(root, 'request_test'), silentLogger)
  await layout.ensure()
  const stages = new ReconstructionStageRunner(runner, layout, testConfig(root), silentLogger)
  return { runner, layout, stages }
}

// ─── Sparse reconstruction ──────────────────────────────────────────────────

describe('ReconstructionStageRunner: structure from motion', () => {
  it('passes the GPU switch and runs in the workspace', async () => {
    const { runner, layout, stages } = await setup()
    const result = await stages.featureExtraction(false)

    expect(result).toEqual({ success: true, databasePath: layout.database, useGpu: false })
    const [call] = runner.calls
    expect(call?.command).toBe('colmap')
    expect(call?.cwd).toBe(layout.root)
    expect(argValue(call?.args ?? [], '--SiftExtraction.use_gpu')).toBe('0')
    expect(argValue(call?.args ?? [], '--image_path')).toBe(layout.images)
  })

  it('keeps a spawn error verbatim', async () => {
    const runner = new FakeRunner().on('feature_extractor', () => ({ exitCode: null, spawnError: 'spawn colmap ENOENT' }))
    const { stages } = await setup(runner)
    const result = await stages.featureExtraction(true)
    expect(result.success).toBe(false)
    expect(result.error).toBe('spawn colmap ENOENT')
    expect(result.exitCode).toBeNull()
  })

  it('reports the exit code and stderr tail of a failed stage', async () => {
    const runner = new FakeRunner().on('exhaustive_matcher', () => ({ exitCode: 1, stderr: 'line1\nline2\n' }))
    const { stages } = await setup(runner)
    const result = await stages.featureMatching(true)
    expect(result).toMatchObject({
      success: false,
      error: 'exhaustive_matcher failed with exit code 1',
      exitCode: 1,
      stderr: 'line1\nline2',
    })
  })

  it('uses relaxed mapper thresholds and finds the model directory', async () => {
    const { runner, layout, stages } = await setup()
    const result = await stages.mapping()

    expect(result).toEqual({ success: true, sparseDirectory: layout.sparse, modelPath: join(layout.sparse, '0') })
    const args = runner.calls[0]?.args ?? []
    expect(args.slice(-RELAXED_MAPPER_ARGS.length)).toEqual([...RELAXED_MAPPER_ARGS])
  })

  it('fails mapping that exits cleanly without a model', async () => {
    const { stages } = await setup(new FakeRunner())
    const result = await stages.mapping()
    expect(result.success).toBe(false)
    expect(result.error).toBe('Mapping produced no reconstruction model')
  })

  it('exports the sparse model as a point cloud under output/', async () => {
    const { layout, stages } = await setup()
    const result = await stages.exportSparse(join(layout.sparse, '0'))
    expect(result).toEqual({ success: true, pointCloudPath: join(layout.output, 'sparse.ply'), points: 60 })
  })

  it('fails an export that wrote nothing', async () => {
    const { stages } = await setup(new FakeRunner())
    const result = await stages.exportSparse('/nowhere')
    expect(result.error).toBe('Sparse point cloud was not written')
  })
})

// ─── Dense reconstruction ───────────────────────────────────────────────────

describe('ReconstructionStageRunner: dense stereo', () => {
  it('fuses a dense cloud and reports its size', async () => {
    const { runner, layout, stages } = await setup()
    const result = await stages.denseStereo(false)

    expect(result.success).toBe(true)
    expect(result.points).toBe(400)
    expect(result.usedMasks).toBe(false)
    expect(result.pointCloudPath).toBe(join(layout.dense, 'fused.ply'))
    expect(runner.steps).toEqual(['patch_match_stereo', 'stereo_fusion'])
    expect(runner.calls[1]?.args).not.toContain('--StereoFusion.mask_path')
  })

  it('treats a thin fused cloud as empty', async () => {
    const { stages } = await setup(simulateTools(new FakeRunner(), { densePoints: 90 }))
    const result = await stages.denseStereo(false)
    expect(result.success).toBe(false)
    expect(result.error).toBe('Empty point cloud (90 points)')
    expect(result.points).toBe(90)
  })

  it('rejects a fused cloud cut short of its declared points', async () => {
    const runner = simulateTools(new FakeRunner()).on('stereo_fusion', async (spec) => {
      const path = argValue(spec.args, '--output_path')
      await writePointCloud(path, 400)
      // 400 coloured vertices need 6000 body bytes; keep half.
      await truncate(path, (await stat(path)).size - 3000)
    })
    const { stages } = await setup(runner)
    const result = await stages.denseStereo(false)

    expect(result.success).toBe(false)
    expect(result.points).toBe(400)
    expect(result.error).toBe(`Dense point cloud is truncated (${result.bytes} bytes for 400 points)`)
  })

  it('copies masks next to the undistorted images and restricts fusion to them', async () => {
    const { runner, layout, stages } = await setup()
    const jpeg = await jpegImage()
    await layout.persistImages([jpeg, jpeg])
    await layout.persistMasks([await pngImage()])

    const result = await stages.denseStereo(true)

    expect(result).toMatchObject({ success: true, usedMasks: true, masksCopied: 1 })
    const maskDir = join(layout.dense, 'masks')
    expect(await readdir(maskDir)).toEqual(['image_000.jpg.png'])
    expect(argValue(runner.calls[0]?.args ?? [], '--PatchMatchStereo.filter')).toBe('true')
    expect(argValue(runner.calls[1]?.args ?? [], '--StereoFusion.mask_path')).toBe(maskDir)
  })

  it('skips mask fusion when no mask matches an image', async () => {
    const { runner, layout, stages } = await setup()
    await layout.persistImages([await jpegImage()])

    const result = await stages.denseStereo(true)

    expect(result).toMatchObject({ success: true, usedMasks: false, masksCopied: 0 })
    expect(runner.calls[1]?.args).not.toContain('--StereoFusion.mask_path')
  })
})

describe('inspectPointCloud', () => {
  it('reads the vertex count from the header', async () => {
    const dir = await tempDir()
    const path = join(dir, 'cloud.ply')
    await writePointCloud(path, 12, false)
    const info = await inspectPointCloud(path)
    expect(info?.points).toBe(12)
  })

  it('measures the body against the header', async () => {
    const dir = await tempDir()
    const path = join(dir, 'cloud.ply')
    await writePointCloud(path, 12, false)
    const full = (await stat(path)).size
    expect(await inspectPointCloud(path)).toEqual({ bytes: full, points: 12, truncated: false })

    // 12 bytes per position-only vertex.
    await truncate(path, full - 1)
    expect(await inspectPointCloud(path)).toEqual({ bytes: full - 1, points: 12, truncated: true })
  })

  it('is undefined for a missing file', async () => {
    expect(await inspectPointCloud('/definitely/not/here.ply')).toBeUndefined()
  })
})
