import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rm } from 'node:fs/promises'
import { basename, extname } from 'node:path'
import type { PipelineConfig } from '@photomesh/config'
import type {
  MaskMode,
  MaskSource,
  MaskingResult,
  MeshResult,
  PipelineReport,
  PipelineStages,
  PipelineState,
  PointCloudArtifact,
  ReconstructionBranch,
  StageName,
} from '@photomesh/types'
import { assertNever } from '@photomesh/types'
import type { Logger } from '../logger'
import { createLogger } from '../logger'
import { errorMessage } from '../errors'
import { applyMasks } from '../masking/apply-mask'
import { BackgroundMasker } from '../masking/background-masker'
import type { DirectoryMaskResult } from '../masking/background-masker'
import { MeshBuilder } from '../mesh/mesh-builder'
import { NodeProcessRunner } from '../process/runner'
import type { ProcessRunner } from '../process/runner'
import { ReconstructionStageRunner } from '../reconstruction/stage-runner'
import { WorkspaceLayout } from '../workspace/layout'
import { deepFreeze } from './freeze'

export interface PipelineInput {
  /** Raw image bytes in order; anything past the image cap is dropped. */
  images: readonly Uint8Array[]
  /** Pre-made binary masks, matched to images by position. */
  masks?: readonly Uint8Array[]
  /** Background-removal key; falls back to the configured one. */
  apiKey?: string
  /** Embed produced files as base64 in the report. */
  includeFiles?: boolean
}

export interface PipelineCoordinatorOptions {
  config: PipelineConfig
  runner?: ProcessRunner
  logger?: Logger
  /** Passed to the background masker. */
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  newRunId?: () => string
  onStateChange?: (state: PipelineState, runId: string) => void
}

/** Thrown inside a run to stop at a stage; never escapes `run`. */
class StageFailure extends Error {
  constructor(readonly stage: StageName, message: string) {
    super(message)
    this.name = 'StageFailure'
  }
}

/** Mutable report under construction. */
interface Draft {
  runId: string
  branch: ReconstructionBranch
  maskSource: MaskSource
  imagesSaved: number
  binaryMasks: number
  stages: PipelineStages
  pointCloud?: PointCloudArtifact
  mesh?: string
  files: string[]
}

const MODEL_EXTENSIONS = ['.glb', '.obj', '.ply']

/**
 * Drives one run through `save-images → masks → reconstruct → mesh → done`;
 * any failing stage moves the run to `failed` and ends it.
 *
 * Each run gets a fresh `request_<runId>` workspace, so one coordinator can
 * serve concurrent runs. The returned report is deep-frozen.
 */
export class PipelineCoordinator {
  private readonly config: PipelineConfig
  private readonly runner: ProcessRunner
  private readonly logger: Logger
  private readonly options: PipelineCoordinatorOptions

  constructor(options: PipelineCoordinatorOptions) {
    this.options = options
    this.config = options.config
    this.logger = options.logger ?? createLogger()
    this.runner = options.runner ?? new NodeProcessRunner(this.logger)
  }

  /** Branch a photogrammetry run takes under the current capabilities. */
  get branch(): ReconstructionBranch {
    if (this.config.engine === 'single-image') return 'single-image'
    return this.config.cpuOnly ? 'sparse' : 'dense'
  }

  async run(input: PipelineInput): Promise<Readonly<PipelineReport>> {
    const runId = this.options.newRunId?.() ?? randomUUID()
    const log = this.logger.child({ runId })
    const layout = WorkspaceLayout.forRun(this.config.workRoot, runId, log, this.config.maxImages)
    const started = new Date()

    const draft: Draft = {
      runId,
      branch: this.branch,
      maskSource: 'none',
      imagesSaved: 0,
      binaryMasks: 0,
      stages: {},
      files: [],
    }

    let state: PipelineState = 'save-images'
    let current: StageName = 'save-images'
    const enter = (next: PipelineState): void => {
      log.info('state', { from: state, to: next })
      state = next
      this.options.onStateChange?.(next, runId)
    }

    let failure: StageFailure | undefined
    let filesBase64: Record<string, string> | undefined
    try {
      this.options.onStateChange?.(state, runId)
      log.info('run_start', { images: input.images.length, branch: draft.branch, workDirectory: layout.root })

      await layout.ensure()
      if (input.images.length === 0) throw new StageFailure('save-images', 'No images provided')
      const saved = await layout.persistImages(input.images)
      draft.imagesSaved = saved.length
      draft.stages.saveImages = { success: true, count: saved.length, directory: layout.images, files: saved }

      enter('masks')
      current = 'masking'
      await this.prepareMasks(input, layout, draft, log)

      enter('reconstruct')
      if (draft.branch !== 'single-image') {
        draft.pointCloud = await this.reconstruct(layout, draft, log, (s) => {
          current = s
        })
      }

      enter('mesh')
      current = 'mesh'
      const mesh = await this.buildMesh(layout, draft)
      draft.stages.mesh = mesh
      if (!mesh.success) throw new StageFailure('mesh', mesh.error ?? 'Mesh generation failed')
      this.collectArtifacts(mesh, draft)
      if (input.includeFiles) filesBase64 = await encodeFiles(draft.files)

      enter('done')
    } catch (err) {
      failure = err instanceof StageFailure ? err : new StageFailure(current, errorMessage(err))
      log.error('run_failed', { stage: failure.stage, error: failure.message })
      enter('failed')
    }

    const finished = new Date()
    const report: PipelineReport = {
      runId,
      success: failure === undefined,
      ...(failure ? { stage: failure.stage, error: failure.message } : {}),
      branch: draft.branch,
      maskSource: draft.maskSource,
      workDirectory: layout.root,
      imagesSaved: draft.imagesSaved,
      binaryMasks: draft.binaryMasks,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: finished.getTime() - started.getTime(),
      stages: draft.stages,
      artifacts: { pointCloud: draft.pointCloud, mesh: draft.mesh, files: draft.files },
      ...(filesBase64 ? { filesBase64 } : {}),
    }
    log.info('run_finished', { success: report.success, stage: report.stage, ms: report.durationMs })
    return deepFreeze(report)
  }

  /** Supplied masks win; otherwise the API when a key is present; otherwise none. */
  private async prepareMasks(
    input: PipelineInput,
    layout: WorkspaceLayout,
    draft: Draft,
    log: Logger,
  ): Promise<void> {
    const mode: MaskMode = draft.branch === 'single-image' ? 'rgba' : 'mask'

    if (input.masks && input.masks.length > 0) {
      const written = await layout.persistMasks(input.masks)
      draft.maskSource = 'supplied'
      draft.binaryMasks = (await layout.listMasks()).length
      log.info('masks_supplied', { count: written.length })
      if (mode === 'rgba') {
        await this.cutOutSupplied(layout, written, draft, log)
        return
      }
      draft.stages.masking = {
        success: true,
        mode: 'mask',
        source: 'supplied',
        processed: written.length,
        failed: 0,
        total: written.length,
        partialSuccess: false,
        directory: layout.masks,
      }
      return
    }

    const apiKey = input.apiKey ?? this.config.masking.apiKey
    if (!apiKey) {
      log.info('masks_skipped', { reason: 'no API key' })
      return
    }

    const directory = mode === 'mask' ? layout.masks : layout.masked
    const masker = new BackgroundMasker({
      apiKey,
      apiUrl: this.config.masking.apiUrl,
      maxRetries: this.config.masking.maxRetries,
      timeoutMs: this.config.masking.timeoutMs,
      logger: log.child({ component: 'masker' }),
      fetch: this.options.fetch,
      sleep: this.options.sleep,
    })
    let result: DirectoryMaskResult
    try {
      result = await masker.processDirectory(layout.images, directory, { mode })
    } catch (err) {
      result = { success: false, error: errorMessage(err), processed: 0, failed: 0, total: 0, partialSuccess: false }
    }
    const masking: MaskingResult = { ...result, mode, source: 'api', directory }
    draft.stages.masking = masking

    if (result.success) {
      draft.maskSource = 'api'
      draft.binaryMasks = mode === 'mask' ? (await layout.listMasks()).length : 0
    } else {
      log.warn('masking_degraded', { error: result.error, failed: result.failed, total: result.total })
    }
  }

  /** The single-image model takes cutouts, so supplied masks become alpha. */
  private async cutOutSupplied(
    layout: WorkspaceLayout,
    masks: readonly string[],
    draft: Draft,
    log: Logger,
  ): Promise<void> {
    const images = await layout.listImages()
    let result: DirectoryMaskResult
    try {
      result = await applyMasks(images, masks, layout.masked, log)
    } catch (err) {
      // Partial cutouts would shadow the originals in buildMesh.
      await rm(layout.masked, { recursive: true, force: true })
      await mkdir(layout.masked, { recursive: true })
      result = {
        success: false,
        error: errorMessage(err),
        processed: 0,
        failed: 0,
        total: images.length,
        partialSuccess: false,
      }
    }
    draft.stages.masking = { ...result, mode: 'rgba', source: 'supplied', directory: layout.masked }
    if (!result.success) {
      draft.maskSource = 'none'
      log.warn('masking_degraded', { error: result.error, failed: result.failed, total: result.total })
    }
  }

  /** SfM, then the sparse export or the dense MVS branch. */
  private async reconstruct(
    layout: WorkspaceLayout,
    draft: Draft,
    log: Logger,
    at: (stage: StageName) => void,
  ): Promise<PointCloudArtifact> {
    const stages = new ReconstructionStageRunner(this.runner, layout, this.config, log.child({ component: 'sfm' }))
    const useGpu = !this.config.cpuOnly

    at('feature-extraction')
    const extraction = await stages.featureExtraction(useGpu)
    draft.stages.featureExtraction = extraction
    check('feature-extraction', extraction)

    at('feature-matching')
    const matching = await stages.featureMatching(useGpu)
    draft.stages.featureMatching = matching
    check('feature-matching', matching)

    at('mapping')
    const mapping = await stages.mapping()
    draft.stages.mapping = mapping
    check('mapping', mapping)
    const modelPath = mapping.modelPath ?? layout.sparse

    switch (draft.branch) {
      case 'sparse': {
        at('sparse-export')
        const exported = await stages.exportSparse(modelPath)
        draft.stages.sparseExport = exported
        check('sparse-export', exported)
        return { kind: 'sparse', path: exported.pointCloudPath, points: exported.points }
      }
      case 'dense': {
        at('undistortion')
        const undistorted = await stages.undistortion(modelPath)
        draft.stages.undistortion = undistorted
        check('undistortion', undistorted)

        at('dense-stereo')
        const useMasks = this.config.masking.useInFusion && (await layout.hasUsableMasks())
        const dense = await stages.denseStereo(useMasks)
        draft.stages.denseStereo = dense
        check('dense-stereo', dense)
        return { kind: 'dense', path: dense.pointCloudPath, points: dense.points }
      }
      case 'single-image':
        throw new StageFailure('feature-extraction', 'Single-image runs have no reconstruction stage')
      default:
        return assertNever(draft.branch)
    }
  }

  private async buildMesh(layout: WorkspaceLayout, draft: Draft): Promise<MeshResult> {
    const builder = new MeshBuilder(this.runner, this.config, this.logger.child({ runId: draft.runId }))
    if (draft.branch === 'single-image') {
      const cutouts = await layout.listMasks(layout.masked)
      const inputs = cutouts.length > 0 ? cutouts : await layout.listImages()
      return builder.fromImages(inputs, layout.output)
    }
    if (!draft.pointCloud) throw new StageFailure('mesh', 'No point cloud to mesh')
    return builder.fromPointCloud(draft.pointCloud, layout.output)
  }

  private collectArtifacts(mesh: MeshResult, draft: Draft): void {
    switch (mesh.path) {
      case 'point-cloud':
        draft.mesh = mesh.meshPath
        draft.files = [mesh.meshPath, draft.pointCloud?.path].filter((p): p is string => p !== undefined)
        return
      case 'neural':
        draft.files = mesh.files
        draft.mesh = mesh.files.find((f) => MODEL_EXTENSIONS.includes(extname(f).toLowerCase()))
        return
      default:
        assertNever(mesh)
    }
  }
}

function check(stage: StageName, result: { success: boolean; error?: string }): void {
  if (!result.success) throw new StageFailure(stage, result.error ?? `${stage} failed`)
}

/** Base64 contents keyed by file name; later duplicates win. */
async function encodeFiles(paths: readonly string[]): Promise<Record<string, string>> {
  const out: Record<string, string> = {}
  for (const path of paths) {
    out[basename(path)] = (await readFile(path)).toString('base64')
  }
  return out
}
