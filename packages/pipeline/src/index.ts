// Image → mesh reconstruction pipeline: workspace, background masking,
// SfM/MVS stages, meshing, and the coordinator that sequences them.

export {
  createLogger,
  silentLogger,
  stdioSink,
  type Logger,
  type LogLevel,
  type LogFields,
  type LogSink,
  type LoggerOptions,
} from './logger'

export {
  StageProcessError,
  classifyOutcome,
  errorMessage,
  tail,
  type ProcessErrorKind,
} from './errors'

export {
  NodeProcessRunner,
  type ProcessRunner,
  type ProcessSpec,
  type ProcessOutcome,
  type BackgroundProcess,
} from './process/runner'

export {
  DisplayAllocator,
  openVirtualDisplay,
  type DisplaySession,
  type VirtualDisplayOptions,
} from './process/virtual-display'

export {
  WorkspaceLayout,
  IMAGE_FILE_PATTERN,
  imageStem,
  listFiles,
  listFilesRecursive,
  isNotFound,
} from './workspace/layout'

export {
  prepareImage,
  DEFAULT_HEIF_DECODERS,
  DEFAULT_IMAGE_EXTENSION,
  type HeifDecoder,
  type PreparedImage,
} from './workspace/image-format'

export {
  BackgroundMasker,
  writeAtomic,
  type BackgroundMaskerOptions,
  type DirectoryMaskResult,
  type ProcessDirectoryOptions,
} from './masking/background-masker'

export {
  ReconstructionStageRunner,
  RELAXED_MAPPER_ARGS,
  inspectPointCloud,
  type PointCloudInfo,
} from './reconstruction/stage-runner'

export { MeshBuilder } from './mesh/mesh-builder'
export { PointCloudMesher, MESH_FILES } from './mesh/point-cloud-mesher'
export { NeuralMesher, ENTRYPOINT_CANDIDATES } from './mesh/neural-mesher'

export {
  PipelineCoordinator,
  type PipelineInput,
  type PipelineCoordinatorOptions,
} from './coordinator/coordinator'
export { deepFreeze } from './coordinator/freeze'
