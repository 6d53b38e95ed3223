import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import type { PipelineConfig } from '@photomesh/config'
import type { Logger } from '@photomesh/pipeline'
import type { ReconstructionBranch } from '@photomesh/types'
import { securityHeaders } from './lib/security-headers'
import { requestLogger } from './lib/request-logger'
import { rateLimit } from './lib/rate-limit'
import type { RateLimitConfig } from './lib/rate-limit'
import { generateRoutes } from './routes/generate'
import type { PipelineService } from './routes/generate'
import { downloadRoutes } from './routes/download'

export const API_VERSION = '0.1.0'

export interface AppDeps {
  pipeline: PipelineService & { readonly branch: ReconstructionBranch }
  config: PipelineConfig
  logger: Logger
  corsOrigins: string[]
  production: boolean
  /** Budget for POST /generate. */
  generateLimit?: Omit<RateLimitConfig, 'keyFn'>
}

export function createApp(deps: AppDeps): Hono {
  const { config, logger } = deps
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status)
    }
    logger.error('unhandled_error', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: deps.production ? undefined : err.stack,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  app.use('*', requestLogger(logger))
  app.use(
    '*',
    cors({
      origin: deps.corsOrigins.includes('*') ? '*' : deps.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )
  app.use('*', securityHeaders({ production: deps.production }))
  app.use('/generate', rateLimit(deps.generateLimit ?? { windowMs: 60_000, max: 10 }))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.get('/', (c) => c.json({ name: 'photomesh', version: API_VERSION, status: 'online' }))

  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      engine: config.engine,
      branch: deps.pipeline.branch,
      cpuOnly: config.cpuOnly,
      maskingConfigured: config.masking.apiKey !== undefined,
    }),
  )

  app.route('/generate', generateRoutes({
    pipeline: deps.pipeline,
    logger: logger.child({ route: 'generate' }),
    defaultApiKey: config.masking.apiKey,
  }))
  app.route('/download', downloadRoutes(config.workRoot))

  return app
}
