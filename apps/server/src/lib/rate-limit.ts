/**
 * In-memory fixed-window rate limiter for Hono.
 *
 * Each limiter owns its counters, so two routes never share a budget.
 */

import type { Context, MiddlewareHandler } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to the first forwarded client address. */
  keyFn?: (c: Context) => string
}

interface Entry {
  count: number
  resetAt: number
}

/** Expired entries are swept once the table grows past this. */
const SWEEP_THRESHOLD = 10_000

export function rateLimit(config: RateLimitConfig): MiddlewareHandler {
  const store = new Map<string, Entry>()

  const sweep = (now: number): void => {
    for (const [key, entry] of store) {
      if (now > entry.resetAt) store.delete(key)
    }
  }

  return async (c, next) => {
    const key =
      config.keyFn?.(c) ??
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
      'unknown'

    const now = Date.now()
    if (store.size > SWEEP_THRESHOLD) sweep(now)
    const entry = store.get(key)

    if (!entry || now > entry.resetAt) {
      store.set(key, { count: 1, resetAt: now + config.windowMs })
      return next()
    }

    if (entry.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((entry.resetAt - now) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    entry.count++
    return next()
  }
}
