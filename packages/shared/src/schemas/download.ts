import { z } from 'zod'

/** A bare file name: no separators, no parent references. */
export const downloadParams = z.object({
  filename: z
    .string()
    .min(1)
    .max(255)
    .regex(/^[A-Za-z0-9._-]+$/, 'Invalid file name')
    .refine((v) => v !== '.' && v !== '..', 'Invalid file name'),
})
