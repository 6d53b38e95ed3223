import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join } from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'
import type { MaskMode } from '@photomesh/types'
import type { Logger } from '../logger'
import { errorMessage } from '../errors'
import { IMAGE_FILE_PATTERN, listFiles, stemOf } from '../workspace/layout'

export interface BackgroundMaskerOptions {
  apiKey: string
  apiUrl: string
  /** Attempts per image, including the first. */
  maxRetries: number
  /** Per-attempt request timeout. */
  timeoutMs: number
  logger: Logger
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
}

/** Counts from one directory pass. */
export interface DirectoryMaskResult {
  success: boolean
  processed: number
  failed: number
  total: number
  partialSuccess: boolean
  error?: string
}

export interface ProcessDirectoryOptions {
  mode?: MaskMode
  /** File names to pick up; common image extensions by default. */
  pattern?: RegExp
  onProgress?: (current: number, total: number, filename: string) => void
}

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
}

/** What a single attempt ended with, and how long to wait before the next. */
type AttemptOutcome =
  | { kind: 'done' }
  | { kind: 'fatal'; reason: string }
  | { kind: 'retry'; reason: string; waitMs: number }

/**
 * Client for the background-removal segment endpoint.
 *
 * Each image gets its own request (no connection reuse between images).
 * Transient failures are retried with the waits below; client errors other
 * than 429 fail the image at once. A call never throws: exhausting every
 * attempt yields `false`.
 *
 * | outcome            | wait before retry      |
 * |--------------------|------------------------|
 * | 429                | 2^(attempt+1) s        |
 * | 5xx                | 2 s                    |
 * | timeout            | 2 s                    |
 * | connection error   | 3 s                    |
 * | empty 200 body     | none                   |
 * | anything else      | 2 s                    |
 */
export class BackgroundMasker {
  private readonly fetchImpl: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly options: BackgroundMaskerOptions) {
    this.fetchImpl = options.fetch ?? fetch
    this.sleep = options.sleep ?? ((ms) => delay(ms))
  }

  /**
   * Segment one image and write the PNG to `outputPath`.
   *
   * The body goes to a temp file beside the output first and is renamed into
   * place only when non-empty, so `outputPath` never holds a partial file.
   */
  async removeOne(inputPath: string, outputPath: string, mode: MaskMode = 'mask'): Promise<boolean> {
    const { maxRetries, logger } = this.options
    const name = basename(inputPath)

    let image: Uint8Array
    try {
      image = await readFile(inputPath)
      await mkdir(dirname(outputPath), { recursive: true })
    } catch (err) {
      logger.error('mask_io_failed', { file: name, error: errorMessage(err) })
      return false
    }

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      const outcome = await this.attempt(image, name, outputPath, mode, attempt)
      if (outcome.kind === 'done') {
        logger.info('mask_written', { file: name, attempt: attempt + 1 })
        return true
      }
      if (outcome.kind === 'fatal') {
        logger.warn('mask_failed', { file: name, reason: outcome.reason })
        return false
      }

      const last = attempt === maxRetries - 1
      logger.warn('mask_retry', {
        file: name,
        attempt: attempt + 1,
        of: maxRetries,
        reason: outcome.reason,
        waitMs: last ? 0 : outcome.waitMs,
      })
      if (!last && outcome.waitMs > 0) await this.sleep(outcome.waitMs)
    }

    logger.warn('mask_failed', { file: name, reason: `gave up after ${maxRetries} attempts` })
    return false
  }

  /**
   * Segment every matching file in `inputDir` in sorted order, writing
   * `<stem>.png` into `outputDir`.
   */
  async processDirectory(
    inputDir: string,
    outputDir: string,
    options: ProcessDirectoryOptions = {},
  ): Promise<DirectoryMaskResult> {
    const mode = options.mode ?? 'mask'
    const files = await listFiles(inputDir, options.pattern ?? IMAGE_FILE_PATTERN)
    if (files.length === 0) {
      return {
        success: false,
        error: 'No images found to process',
        processed: 0,
        failed: 0,
        total: 0,
        partialSuccess: false,
      }
    }

    await mkdir(outputDir, { recursive: true })
    this.options.logger.info('masking_start', { mode, total: files.length })

    let processed = 0
    let failed = 0
    for (const [i, file] of files.entries()) {
      options.onProgress?.(i + 1, files.length, basename(file))
      const ok = await this.removeOne(file, join(outputDir, `${stemOf(file)}.png`), mode)
      if (ok) processed++
      else failed++
    }

    this.options.logger.info('masking_done', { mode, processed, failed })
    return {
      success: processed > 0,
      processed,
      failed,
      total: files.length,
      partialSuccess: processed > 0 && failed > 0,
    }
  }

  private async attempt(
    image: Uint8Array,
    name: string,
    outputPath: string,
    mode: MaskMode,
    attempt: number,
  ): Promise<AttemptOutcome> {
    const form = new FormData()
    const type = CONTENT_TYPES[extname(name).toLowerCase()] ?? 'image/jpeg'
    form.append('image_file', new Blob([image], { type }), name)
    form.append('format', 'png')
    form.append('channels', mode === 'mask' ? 'alpha' : 'rgba')

    let response: Response
    try {
      response = await this.fetchImpl(this.options.apiUrl, {
        method: 'POST',
        headers: { 'x-api-key': this.options.apiKey, connection: 'close' },
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })
    } catch (err) {
      return classifyRequestError(err)
    }

    if (response.status === 429) {
      await this.discard(response)
      return { kind: 'retry', reason: 'rate limited', waitMs: 2 ** (attempt + 1) * 1000 }
    }
    if (response.status >= 500) {
      await this.discard(response)
      return { kind: 'retry', reason: `server error ${response.status}`, waitMs: 2000 }
    }
    if (response.status !== 200) {
      const text = await response.text().catch(() => '')
      return { kind: 'fatal', reason: `${response.status} ${text.slice(0, 100)}`.trim() }
    }

    try {
      const body = new Uint8Array(await response.arrayBuffer())
      if (body.byteLength === 0) return { kind: 'retry', reason: 'empty response', waitMs: 0 }
      await writeAtomic(outputPath, body)
      return { kind: 'done' }
    } catch (err) {
      return { kind: 'retry', reason: errorMessage(err).slice(0, 100), waitMs: 2000 }
    }
  }

  /** Release an unread body; the status alone decides the outcome. */
  private async discard(response: Response): Promise<void> {
    try {
      await response.body?.cancel()
    } catch (err) {
      this.options.logger.debug('mask_body_discard_failed', { status: response.status, error: errorMessage(err) })
    }
  }
}

function classifyRequestError(err: unknown): AttemptOutcome {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return { kind: 'retry', reason: 'timeout', waitMs: 2000 }
  }
  // undici reports refused/reset connections as TypeError('fetch failed').
  if (err instanceof TypeError) {
    return { kind: 'retry', reason: `connection error: ${errorMessage(err.cause ?? err)}`, waitMs: 3000 }
  }
  return { kind: 'retry', reason: errorMessage(err).slice(0, 100), waitMs: 2000 }
}

/** Write through a temp file in the same directory, then rename into place. */
export async function writeAtomic(path: string, data: Uint8Array): Promise<void> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`)
  try {
    await writeFile(tmp, data)
    await rename(tmp, path)
  } finally {
    await rm(tmp, { force: true })
  }
}
