import { z } from 'zod'

/** HTML form booleans arrive as strings; accept the usual spellings. */
const formBoolean = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((v) => {
    if (typeof v === 'boolean') return v
    if (v === undefined) return false
    return ['true', '1', 'on', 'yes'].includes(v.trim().toLowerCase())
  })

/** Non-file fields of the multipart `/generate` form. */
export const generateFieldsSchema = z.object({
  photoroom_api_key: z
    .string()
    .trim()
    .max(512)
    .optional()
    .transform((v) => (v === '' ? undefined : v)),
  include_files: formBoolean,
})

export type GenerateFields = z.output<typeof generateFieldsSchema>

/** Per-request upload limits. */
export const uploadLimits = {
  maxFiles: 5,
  maxFileBytes: 25 * 1024 * 1024,
} as const
