import { serve } from '@hono/node-server'
import { loadPipelineConfig } from '@photomesh/config'
import { PipelineCoordinator, createLogger } from '@photomesh/pipeline'
import type { LogLevel } from '@photomesh/pipeline'
import { env } from './lib/env'
import { createApp } from './app'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const logger = createLogger({
  level: LOG_LEVELS.find((l) => l === env.LOG_LEVEL) ?? 'info',
  bindings: { service: 'photomesh' },
})
const config = loadPipelineConfig()
const pipeline = new PipelineCoordinator({ config, logger: logger.child({ component: 'pipeline' }) })

const app = createApp({
  pipeline,
  config,
  logger,
  corsOrigins: env.CORS_ORIGINS,
  production: env.NODE_ENV === 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT, hostname: env.HOST }, (info) => {
  logger.info('server_started', {
    port: info.port,
    env: env.NODE_ENV,
    engine: config.engine,
    branch: pipeline.branch,
    workRoot: config.workRoot,
  })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })
  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
