/**
 * One structured line per request: method, path, status and duration.
 */

import type { MiddlewareHandler } from 'hono'
import type { Logger } from '@photomesh/pipeline'

export function requestLogger(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now()
    await next()
    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number((performance.now() - start).toFixed(1)),
    })
  }
}
