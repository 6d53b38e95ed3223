// Shared configuration: capability flags and validated pipeline settings.

export {
  resolveFlag,
  resolveFlags,
  readEnvFlag,
  DEFAULT_FLAGS,
  FEATURE_FLAG_KEYS,
  type FeatureFlags,
  type FeatureFlagKey,
} from './flags'

export {
  pipelineConfigSchema,
  createPipelineConfig,
  loadPipelineConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from './pipeline-config'
