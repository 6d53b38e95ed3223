import { Hono } from 'hono'
import { generateFieldsSchema, uploadLimits } from '@photomesh/shared'
import type { GenerateFields } from '@photomesh/shared'
import type { Logger, PipelineInput } from '@photomesh/pipeline'
import type { PipelineReport } from '@photomesh/types'
import { isResponse, parseForm, textOf, uploadsOf, validate } from '../lib/validate'
import type { Upload } from '../lib/validate'

/** What the route needs from the pipeline. */
export interface PipelineService {
  run(input: PipelineInput): Promise<Readonly<PipelineReport>>
}

export interface GenerateRouteDeps {
  pipeline: PipelineService
  logger: Logger
  /** Key used when the form carries none. */
  defaultApiKey?: string
}

interface FileInfo {
  filename: string
  size: number
  contentType: string
}

/**
 * POST /generate: multipart `files` (1–5 images, extras dropped), optional
 * `masks`, `photoroom_api_key` and `include_files`.
 */
export function generateRoutes(deps: GenerateRouteDeps): Hono {
  const routes = new Hono()

  routes.post('/', async (c) => {
    const form = await parseForm(c)
    if (isResponse(form)) return form

    const fields = validate(c, generateFieldsSchema, {
      photoroom_api_key: textOf(form, 'photoroom_api_key'),
      include_files: textOf(form, 'include_files'),
    })
    if (isResponse(fields)) return fields

    const files = uploadsOf(form, 'files').slice(0, uploadLimits.maxFiles)
    if (files.length === 0) return c.json({ error: 'No files uploaded.' }, 400)
    const masks = uploadsOf(form, 'masks').slice(0, uploadLimits.maxFiles)

    const oversized = [...files, ...masks].find((f) => f.size > uploadLimits.maxFileBytes)
    if (oversized) {
      return c.json({ error: `File too large: ${oversized.name}.` }, 413)
    }

    const apiKey = fields.photoroom_api_key ?? deps.defaultApiKey
    deps.logger.info('generate_request', {
      files: files.length,
      masks: masks.length,
      apiKeyPresent: apiKey !== undefined,
    })

    const report = await deps.pipeline.run(pipelineInputOf(fields, await readAll(files), await readAll(masks)))

    return c.json({
      status: report.success ? 'success' : 'error',
      filesReceived: files.length,
      fileInfo: files.map(describe),
      apiKeyPresent: apiKey !== undefined,
      pipelineResult: report,
    })
  })

  return routes
}

/** Pipeline input for one validated form. Without masks the pipeline picks its own. */
export function pipelineInputOf(fields: GenerateFields, images: Uint8Array[], masks: Uint8Array[]): PipelineInput {
  return {
    images,
    masks: masks.length > 0 ? masks : undefined,
    apiKey: fields.photoroom_api_key,
    includeFiles: fields.include_files,
  }
}

async function readAll(uploads: readonly Upload[]): Promise<Uint8Array[]> {
  return Promise.all(uploads.map(async (u) => new Uint8Array(await u.arrayBuffer())))
}

function describe(upload: Upload): FileInfo {
  return { filename: upload.name, size: upload.size, contentType: upload.type }
}
