// ─── Stage names ────────────────────────────────────────────────────────────

/** Every independently-failing step a run can stop at. */
export type StageName =
  | 'save-images'
  | 'masking'
  | 'feature-extraction'
  | 'feature-matching'
  | 'mapping'
  | 'sparse-export'
  | 'undistortion'
  | 'dense-stereo'
  | 'mesh'

/** Reconstruction branch chosen for a run. */
export type ReconstructionBranch = 'sparse' | 'dense' | 'single-image'

/** Which upstream produced the masks a run used. */
export type MaskSource = 'supplied' | 'api' | 'none'

/** Background-removal output: binary opacity mask or full RGBA cutout. */
export type MaskMode = 'mask' | 'rgba'

// ─── Result records ─────────────────────────────────────────────────────────

/** Base shape shared by every stage result. */
export interface StageResultBase {
  success: boolean
  /** Human-readable failure, present only when `success` is false. */
  error?: string
}

/** Stage result carrying a stage-specific payload. */
export type StageResult<P extends object = Record<never, never>> = StageResultBase & P

/** Fields captured from a failed subprocess. */
export interface ProcessFailureFields {
  exitCode?: number | null
  stderr?: string
}

export type SaveImagesResult = StageResult<{
  count: number
  directory: string
  files: string[]
}>

export type MaskingResult = StageResult<{
  mode: MaskMode
  source: MaskSource
  processed: number
  failed: number
  total: number
  partialSuccess: boolean
  directory?: string
}>

export type FeatureExtractionResult = StageResult<
  { databasePath: string; useGpu: boolean } & ProcessFailureFields
>

export type FeatureMatchingResult = StageResult<
  { databasePath: string; useGpu: boolean } & ProcessFailureFields
>

export type MappingResult = StageResult<
  { sparseDirectory: string; modelPath?: string } & ProcessFailureFields
>

export type SparseExportResult = StageResult<
  { pointCloudPath: string; points?: number } & ProcessFailureFields
>

export type UndistortionResult = StageResult<{ denseDirectory: string } & ProcessFailureFields>

export type DenseStereoResult = StageResult<
  {
    pointCloudPath: string
    usedMasks: boolean
    masksCopied: number
    bytes?: number
    points?: number
  } & ProcessFailureFields
>

/** Output of the point-cloud meshing path. */
export type PointCloudMeshResult = StageResult<{
  path: 'point-cloud'
  cloudKind: PointCloudKind
  inputPoints: number
  poissonVertices: number
  poissonTriangles: number
  trimmedVertices: number
  vertices: number
  triangles: number
  hasColors: boolean
  meshPath?: string
} & ProcessFailureFields>

/** Output of the single-image neural path. */
export type NeuralMeshResult = StageResult<{
  path: 'neural'
  outputDir: string
  files: string[]
  format?: 'glb' | 'obj'
  textured: boolean
  attempts: number
  display: 'xvfb' | 'egl'
} & ProcessFailureFields>

export type MeshResult = PointCloudMeshResult | NeuralMeshResult

// ─── Point clouds ───────────────────────────────────────────────────────────

/** Sparse clouds come from SfM triangulation, dense ones from MVS fusion. */
export type PointCloudKind = 'sparse' | 'dense'

/** A point cloud on disk, tagged with its origin. */
export interface PointCloudArtifact {
  kind: PointCloudKind
  path: string
  points?: number
}

/** Exhaustiveness guard for discriminated unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`)
}
