/** Static capability flags. Decided once per process, never per run. */
export interface FeatureFlags {
  /** Skip undistortion and dense stereo; mesh the sparse cloud instead. */
  RECON_CPU_ONLY: boolean
  /** Ask the single-image model for a texture-baked GLB first. */
  RECON_BAKE_TEXTURE: boolean
  /** Feed usable masks into dense fusion. */
  RECON_MASK_FUSION: boolean
}

export type FeatureFlagKey = keyof FeatureFlags

/** All flag keys for iteration. */
export const FEATURE_FLAG_KEYS: readonly FeatureFlagKey[] = [
  'RECON_CPU_ONLY',
  'RECON_BAKE_TEXTURE',
  'RECON_MASK_FUSION',
]

/** Default flag values: GPU path, textured models, masked fusion. */
export const DEFAULT_FLAGS: FeatureFlags = {
  RECON_CPU_ONLY: false,
  RECON_BAKE_TEXTURE: true,
  RECON_MASK_FUSION: true,
}

/** Parse a boolean-ish env value. Unknown strings count as unset. */
export function readEnvFlag(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

/** Resolve a single flag: env override > default. */
export function resolveFlag(key: FeatureFlagKey, env: NodeJS.ProcessEnv = process.env): boolean {
  return readEnvFlag(env, key) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag against an environment. */
export function resolveFlags(env: NodeJS.ProcessEnv = process.env): FeatureFlags {
  const flags: FeatureFlags = { ...DEFAULT_FLAGS }
  for (const key of FEATURE_FLAG_KEYS) flags[key] = resolveFlag(key, env)
  return flags
}
