/**
 * Server environment, read once at startup.
 *
 * Pipeline settings live in `@photomesh/config`; this module only covers the
 * HTTP process itself.
 */

function optional(key: string, fallback: string): string {
  const val = process.env[key]
  return val === undefined || val === '' ? fallback : val
}

function port(key: string, fallback: number): number {
  const raw = optional(key, String(fallback))
  const val = Number(raw)
  if (!Number.isInteger(val) || val < 0 || val > 65535) {
    throw new Error(`Environment variable ${key} must be a port number, got "${raw}".`)
  }
  return val
}

export const env = {
  PORT: port('PORT', 8000),
  HOST: optional('HOST', '0.0.0.0'),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', '*').split(',').map((o) => o.trim()),
  LOG_LEVEL: optional('LOG_LEVEL', 'info'),
} as const
