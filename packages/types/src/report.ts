import type {
  DenseStereoResult,
  FeatureExtractionResult,
  FeatureMatchingResult,
  MappingResult,
  MaskSource,
  MaskingResult,
  MeshResult,
  PointCloudArtifact,
  ReconstructionBranch,
  SaveImagesResult,
  SparseExportResult,
  StageName,
  UndistortionResult,
} from './stages'

/** Every stage result a run can produce, keyed by stage. */
export interface PipelineStages {
  saveImages?: SaveImagesResult
  masking?: MaskingResult
  featureExtraction?: FeatureExtractionResult
  featureMatching?: FeatureMatchingResult
  mapping?: MappingResult
  sparseExport?: SparseExportResult
  undistortion?: UndistortionResult
  denseStereo?: DenseStereoResult
  mesh?: MeshResult
}

/** Paths to what a run left behind in its workspace. */
export interface PipelineArtifacts {
  pointCloud?: PointCloudArtifact
  /** Final mesh or model file. */
  mesh?: string
  /** Every file the mesh stage produced. */
  files: string[]
}

/**
 * Aggregate outcome of one pipeline run.
 *
 * `stage` names the first failing stage. The report is frozen before it is
 * handed back to the caller.
 */
export interface PipelineReport {
  runId: string
  success: boolean
  stage?: StageName
  error?: string
  branch: ReconstructionBranch
  maskSource: MaskSource
  workDirectory: string
  imagesSaved: number
  binaryMasks: number
  startedAt: string
  finishedAt: string
  durationMs: number
  stages: PipelineStages
  artifacts: PipelineArtifacts
  /** Base64 file contents keyed by filename, when requested. */
  filesBase64?: Record<string, string>
}

/** Terminal states of the coordinator state machine. */
export type PipelineState =
  | 'save-images'
  | 'masks'
  | 'reconstruct'
  | 'mesh'
  | 'done'
  | 'failed'
