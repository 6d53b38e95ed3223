import { copyFile, mkdir, open, readdir, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { parsePlyHeader, plyElementCount, plyMinimumBodyBytes } from '@photomesh/geometry'
import type { PipelineConfig } from '@photomesh/config'
import type {
  DenseStereoResult,
  FeatureExtractionResult,
  FeatureMatchingResult,
  MappingResult,
  ProcessFailureFields,
  SparseExportResult,
  UndistortionResult,
} from '@photomesh/types'
import type { Logger } from '../logger'
import { StageProcessError, errorMessage, tail } from '../errors'
import type { ProcessOutcome, ProcessRunner } from '../process/runner'
import { isNotFound, stemOf } from '../workspace/layout'
import type { WorkspaceLayout } from '../workspace/layout'

/** Mapper thresholds relaxed for small (≤ 5 image) sets. */
export const RELAXED_MAPPER_ARGS = [
  '--Mapper.init_min_num_inliers', '15',
  '--Mapper.abs_pose_min_num_inliers', '10',
  '--Mapper.abs_pose_min_inlier_ratio', '0.15',
  '--Mapper.filter_max_reproj_error', '8',
  '--Mapper.init_max_error', '8',
  '--Mapper.min_num_matches', '10',
] as const

type Failure = { success: false; error: string } & ProcessFailureFields

/**
 * Runs the structure-from-motion and multi-view-stereo tool, one
 * subprocess per stage. Stages are not retried and carry no client-side
 * timeout; each returns a StageResult rather than throwing.
 */
export class ReconstructionStageRunner {
  private readonly binary: string

  constructor(
    private readonly runner: ProcessRunner,
    private readonly layout: WorkspaceLayout,
    private readonly config: PipelineConfig,
    private readonly logger: Logger,
  ) {
    this.binary = config.colmap.binary
  }

  get sparsePointCloudPath(): string {
    return join(this.layout.output, 'sparse.ply')
  }

  get densePointCloudPath(): string {
    return join(this.layout.dense, 'fused.ply')
  }

  async featureExtraction(useGpu: boolean): Promise<FeatureExtractionResult> {
    const databasePath = this.layout.database
    const failure = await this.exec('feature_extractor', [
      '--database_path', databasePath,
      '--image_path', this.layout.images,
      '--ImageReader.single_camera', '1',
      '--SiftExtraction.use_gpu', useGpu ? '1' : '0',
    ])
    return failure ? { ...failure, databasePath, useGpu } : { success: true, databasePath, useGpu }
  }

  async featureMatching(useGpu: boolean): Promise<FeatureMatchingResult> {
    const databasePath = this.layout.database
    const failure = await this.exec('exhaustive_matcher', [
      '--database_path', databasePath,
      '--SiftMatching.use_gpu', useGpu ? '1' : '0',
    ])
    return failure ? { ...failure, databasePath, useGpu } : { success: true, databasePath, useGpu }
  }

  /** Incremental mapping. Exit 0 alone is not enough: a model must exist. */
  async mapping(): Promise<MappingResult> {
    const sparseDirectory = this.layout.sparse
    await mkdir(sparseDirectory, { recursive: true })
    const failure = await this.exec('mapper', [
      '--database_path', this.layout.database,
      '--image_path', this.layout.images,
      '--output_path', sparseDirectory,
      ...RELAXED_MAPPER_ARGS,
    ])
    if (failure) return { ...failure, sparseDirectory }

    const modelPath = await firstModelDirectory(sparseDirectory)
    if (!modelPath) {
      return { success: false, error: 'Mapping produced no reconstruction model', sparseDirectory }
    }
    this.logger.info('mapping_model', { modelPath })
    return { success: true, sparseDirectory, modelPath }
  }

  /** Convert the sparse model to a PLY point cloud under `output/`. */
  async exportSparse(modelPath: string): Promise<SparseExportResult> {
    const pointCloudPath = this.sparsePointCloudPath
    const failure = await this.exec('model_converter', [
      '--input_path', modelPath,
      '--output_path', pointCloudPath,
      '--output_type', 'PLY',
    ])
    if (failure) return { ...failure, pointCloudPath }

    const info = await inspectPointCloud(pointCloudPath)
    if (!info) {
      return { success: false, error: 'Sparse point cloud was not written', pointCloudPath }
    }
    if (info.truncated) {
      return {
        success: false,
        error: `Sparse point cloud is truncated (${info.bytes} bytes for ${info.points} points)`,
        pointCloudPath,
      }
    }
    return { success: true, pointCloudPath, points: info.points }
  }

  async undistortion(modelPath: string): Promise<UndistortionResult> {
    const denseDirectory = this.layout.dense
    const failure = await this.exec('image_undistorter', [
      '--image_path', this.layout.images,
      '--input_path', modelPath,
      '--output_path', denseDirectory,
      '--output_type', 'COLMAP',
      '--max_image_size', String(this.config.colmap.maxImageSize),
    ])
    return failure ? { ...failure, denseDirectory } : { success: true, denseDirectory }
  }

  /**
   * Patch-match stereo then fusion into `dense/fused.ply`.
   *
   * With `useMasks`, each binary mask is copied to
   * `dense/masks/<image file name>.png` and fusion is restricted to it.
   */
  async denseStereo(useMasks: boolean): Promise<DenseStereoResult> {
    const pointCloudPath = this.densePointCloudPath
    const maskDir = join(this.layout.dense, 'masks')
    const masksCopied = useMasks ? await this.copyMasksForFusion(maskDir) : 0
    const usedMasks = masksCopied > 0

    const stereoFailure = await this.exec('patch_match_stereo', [
      '--workspace_path', this.layout.dense,
      '--workspace_format', 'COLMAP',
      '--PatchMatchStereo.geom_consistency', 'true',
      '--PatchMatchStereo.gpu_index', '0',
      ...(usedMasks ? ['--PatchMatchStereo.filter', 'true'] : []),
    ])
    if (stereoFailure) return { ...stereoFailure, pointCloudPath, usedMasks, masksCopied }

    const fusionFailure = await this.exec('stereo_fusion', [
      '--workspace_path', this.layout.dense,
      '--workspace_format', 'COLMAP',
      '--input_type', 'geometric',
      '--output_path', pointCloudPath,
      ...(usedMasks ? ['--StereoFusion.mask_path', maskDir] : []),
    ])
    if (fusionFailure) return { ...fusionFailure, pointCloudPath, usedMasks, masksCopied }

    const info = await inspectPointCloud(pointCloudPath)
    if (!info) {
      return { success: false, error: 'Dense point cloud was not written', pointCloudPath, usedMasks, masksCopied }
    }
    const { bytes, points } = info
    if (info.truncated) {
      return {
        success: false,
        error: `Dense point cloud is truncated (${bytes} bytes for ${points} points)`,
        pointCloudPath,
        usedMasks,
        masksCopied,
        bytes,
        points,
      }
    }
    if (bytes <= this.config.mesh.minPointCloudBytes || points <= this.config.mesh.minDensePoints) {
      return {
        success: false,
        error: `Empty point cloud (${points} points)`,
        pointCloudPath,
        usedMasks,
        masksCopied,
        bytes,
        points,
      }
    }
    return { success: true, pointCloudPath, usedMasks, masksCopied, bytes, points }
  }

  private async copyMasksForFusion(maskDir: string): Promise<number> {
    await mkdir(maskDir, { recursive: true })
    const masks = new Map((await this.layout.listMasks()).map((m): [string, string] => [stemOf(m), m]))
    let copied = 0
    for (const image of await this.layout.listImages()) {
      const mask = masks.get(stemOf(image))
      if (!mask) continue
      await copyFile(mask, join(maskDir, `${basename(image)}.png`))
      copied++
    }
    this.logger.info('fusion_masks', { copied, available: masks.size })
    return copied
  }

  /** Run one subcommand; `undefined` on success, a failure record otherwise. */
  private async exec(command: string, args: readonly string[]): Promise<Failure | undefined> {
    const outcome: ProcessOutcome = await this.runner.run({
      command: this.binary,
      args: [command, ...args],
      cwd: this.layout.root,
      label: command,
    })
    const error = StageProcessError.from(command, outcome)
    if (!error) return undefined

    this.logger.error('stage_failed', { stage: command, kind: error.kind, exitCode: outcome.exitCode })
    return {
      success: false,
      error: error.message,
      exitCode: outcome.exitCode,
      stderr: tail(outcome.stderr),
    }
  }
}

/** First non-empty subdirectory of the mapper output, in name order. */
async function firstModelDirectory(sparseDir: string): Promise<string | undefined> {
  const entries = await readdir(sparseDir, { withFileTypes: true })
  const dirs = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort()
  for (const name of dirs) {
    const path = join(sparseDir, name)
    if ((await readdir(path)).length > 0) return path
  }
  return undefined
}

const HEADER_PROBE_BYTES = 64 * 1024

export interface PointCloudInfo {
  bytes: number
  /** Vertex count the header declares. */
  points: number
  /** The file is shorter than the header's elements need. */
  truncated: boolean
}

/** Size and vertex count of a PLY file, read from its header; the body is only measured. */
export async function inspectPointCloud(path: string): Promise<PointCloudInfo | undefined> {
  let bytes: number
  try {
    bytes = (await stat(path)).size
  } catch (err) {
    if (isNotFound(err)) return undefined
    throw err
  }

  const handle = await open(path, 'r')
  try {
    const probe = Buffer.alloc(Math.min(bytes, HEADER_PROBE_BYTES))
    await handle.read(probe, 0, probe.length, 0)
    try {
      const header = parsePlyHeader(probe)
      return {
        bytes,
        points: plyElementCount(header, 'vertex'),
        truncated: bytes < header.bodyOffset + plyMinimumBodyBytes(header),
      }
    } catch (err) {
      throw new Error(`Unreadable point cloud ${basename(path)}: ${errorMessage(err)}`)
    }
  } finally {
    await handle.close()
  }
}
