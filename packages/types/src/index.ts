// Stage result records and the pipeline report shared by the pipeline
// engine and the HTTP transport.

export {
  assertNever,
  type StageName,
  type ReconstructionBranch,
  type MaskSource,
  type MaskMode,
  type StageResultBase,
  type StageResult,
  type ProcessFailureFields,
  type SaveImagesResult,
  type MaskingResult,
  type FeatureExtractionResult,
  type FeatureMatchingResult,
  type MappingResult,
  type SparseExportResult,
  type UndistortionResult,
  type DenseStereoResult,
  type PointCloudMeshResult,
  type NeuralMeshResult,
  type MeshResult,
  type PointCloudKind,
  type PointCloudArtifact,
} from './stages'

export type {
  PipelineStages,
  PipelineArtifacts,
  PipelineReport,
  PipelineState,
} from './report'
