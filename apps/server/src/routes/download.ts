import { Hono } from 'hono'
import { readFile, readdir } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { downloadParams } from '@photomesh/shared'
import { isNotFound, listFilesRecursive } from '@photomesh/pipeline'
import { isResponse, validate } from '../lib/validate'

/**
 * GET /download/:filename: the first file with that name under any run's
 * `output/` directory, runs searched in name order.
 */
export function downloadRoutes(workRoot: string): Hono {
  const routes = new Hono()

  routes.get('/:filename', async (c) => {
    const params = validate(c, downloadParams, { filename: c.req.param('filename') })
    if (isResponse(params)) return params

    const path = await findOutputFile(workRoot, params.filename)
    if (!path) return c.json({ error: 'File not found.' }, 404)

    const data = await readFile(path)
    return new Response(new Uint8Array(data), {
      status: 200,
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': `attachment; filename="${params.filename}"`,
      },
    })
  })

  return routes
}

/** Search `<workRoot>/<run>/output/**` in run-name order. */
export async function findOutputFile(workRoot: string, filename: string): Promise<string | undefined> {
  let runs: string[]
  try {
    runs = (await readdir(workRoot, { withFileTypes: true }))
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort()
  } catch (err) {
    if (isNotFound(err)) return undefined
    throw err
  }

  for (const run of runs) {
    const files = await listFilesRecursive(join(workRoot, run, 'output'))
    const match = files.find((f) => basename(f) === filename)
    if (match) return match
  }
  return undefined
}
