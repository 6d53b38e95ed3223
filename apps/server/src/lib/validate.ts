import type { Context } from 'hono'
import type { z } from 'zod'

/** An uploaded file as hono's multipart parser hands it over. */
export interface Upload {
  name: string
  size: number
  type: string
  arrayBuffer(): Promise<ArrayBuffer>
}

/** Multipart form, every field as a list of its values. */
export type FormFields = Record<string, Array<string | Upload>>

/** Parse a multipart or urlencoded body. Returns 400 when it is malformed. */
export async function parseForm(c: Context): Promise<FormFields | Response> {
  let body: Record<string, unknown>
  try {
    body = await c.req.parseBody({ all: true })
  } catch {
    return c.json({ error: 'Invalid form body.' }, 400)
  }

  const fields: FormFields = {}
  for (const [key, value] of Object.entries(body)) {
    const values: unknown[] = Array.isArray(value) ? value : [value]
    fields[key] = values.filter((v): v is string | Upload => typeof v === 'string' || isUpload(v))
  }
  return fields
}

/** Files under `key`, in submission order. Text values are ignored. */
export function uploadsOf(fields: FormFields, key: string): Upload[] {
  return (fields[key] ?? []).filter(isUpload)
}

/** First text value under `key`. */
export function textOf(fields: FormFields, key: string): string | undefined {
  return (fields[key] ?? []).find((v): v is string => typeof v === 'string')
}

/** Validate input with a Zod schema. Returns 400 with field errors on failure. */
export function validate<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
  input: unknown,
): z.output<T> | Response {
  const result = schema.safeParse(input)
  if (!result.success) {
    const errors = result.error.flatten().fieldErrors
    return c.json({ error: 'Validation failed.', fields: errors }, 400)
  }
  return result.data
}

/** Check if a validation result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}

function isUpload(value: unknown): value is Upload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'arrayBuffer' in value &&
    typeof value.arrayBuffer === 'function' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'size' in value &&
    typeof value.size === 'number' &&
    'type' in value &&
    typeof value.type === 'string'
  )
}
