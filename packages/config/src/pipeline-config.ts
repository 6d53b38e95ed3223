import { z } from 'zod'
import { resolveFlags } from './flags'

/**
 * Pipeline configuration, passed explicitly into the coordinator at
 * construction. Nothing in the pipeline reads `process.env` on its own.
 */
export const pipelineConfigSchema = z.object({
  /** Parent directory for per-run workspaces. */
  workRoot: z.string().min(1).default('/tmp/reconstruction'),
  /** `photogrammetry` runs SfM/MVS; `single-image` runs the neural model. */
  engine: z.enum(['photogrammetry', 'single-image']).default('photogrammetry'),
  /** Static capability switch: sparse branch instead of dense. */
  cpuOnly: z.boolean().default(false),
  /** Inputs beyond this count are dropped without error. */
  maxImages: z.number().int().min(1).max(5).default(5),

  masking: z.object({
    apiUrl: z.string().url().default('https://sdk.photoroom.com/v1/segment'),
    /** Fallback key when a request carries none. */
    apiKey: z.string().min(1).optional(),
    maxRetries: z.number().int().min(1).max(10).default(3),
    timeoutMs: z.number().int().positive().default(90_000),
    /** Feed usable masks into dense fusion. */
    useInFusion: z.boolean().default(true),
  }).default({}),

  colmap: z.object({
    binary: z.string().min(1).default('colmap'),
    maxImageSize: z.number().int().positive().default(2000),
  }).default({}),

  mesh: z.object({
    poissonBinary: z.string().min(1).default('PoissonRecon'),
    poissonDepth: z.number().int().min(4).max(14).default(9),
    normalNeighbors: z.number().int().min(3).default(30),
    /** Neighbour search radius as a fraction of the bounding-box diagonal. */
    normalRadiusFactor: z.number().positive().default(0.1),
    /** Fraction of lowest-density Poisson vertices to strip. */
    densityQuantile: z.number().min(0).max(0.5).default(0.01),
    maxTriangles: z.number().int().positive().default(100_000),
    minSparsePoints: z.number().int().min(1).default(30),
    minDensePoints: z.number().int().min(1).default(100),
    minPointCloudBytes: z.number().int().min(0).default(1024),
  }).default({}),

  neural: z.object({
    pythonBinary: z.string().min(1).default('python'),
    triposrDir: z.string().min(1).default('/root/TripoSR'),
    bakeTexture: z.boolean().default(true),
    xvfbBinary: z.string().min(1).default('Xvfb'),
    /** First X display number tried; busy ones are skipped per run. */
    display: z.string().regex(/^:\d+$/).default(':99'),
    /** Grace period for the virtual display to come up. */
    displayStartupMs: z.number().int().min(0).default(200),
  }).default({}),
})

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>

/** Build a config from partial input, filling every default. */
export function createPipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  return pipelineConfigSchema.parse(input)
}

function num(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw === '') return undefined
  const val = Number(raw)
  if (Number.isNaN(val)) {
    throw new Error(`Environment variable ${key} must be numeric, got "${raw}".`)
  }
  return val
}

function str(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]
  return raw === undefined || raw === '' ? undefined : raw
}

/**
 * Read pipeline configuration from environment variables.
 *
 * Throws a zod error listing every invalid field; call once at startup.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const flags = resolveFlags(env)
  return pipelineConfigSchema.parse({
    workRoot: str(env, 'WORK_DIR'),
    engine: str(env, 'RECON_ENGINE'),
    cpuOnly: flags.RECON_CPU_ONLY,
    masking: {
      apiUrl: str(env, 'PHOTOROOM_API_URL'),
      apiKey: str(env, 'PHOTOROOM_API_KEY'),
      maxRetries: num(env, 'MASK_MAX_RETRIES'),
      timeoutMs: num(env, 'MASK_TIMEOUT_MS'),
      useInFusion: flags.RECON_MASK_FUSION,
    },
    colmap: {
      binary: str(env, 'COLMAP_BIN'),
    },
    mesh: {
      poissonBinary: str(env, 'POISSON_BIN'),
      poissonDepth: num(env, 'POISSON_DEPTH'),
      maxTriangles: num(env, 'MESH_MAX_TRIANGLES'),
    },
    neural: {
      pythonBinary: str(env, 'PYTHON_BIN'),
      triposrDir: str(env, 'TRIPOSR_DIR'),
      bakeTexture: flags.RECON_BAKE_TEXTURE,
      xvfbBinary: str(env, 'XVFB_BIN'),
    },
  })
}
