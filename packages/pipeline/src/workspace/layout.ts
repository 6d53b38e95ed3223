import type { Dirent } from 'node:fs'
import { mkdir, readdir, writeFile } from 'node:fs/promises'
import { join, parse } from 'node:path'
import type { Logger } from '../logger'
import { prepareImage } from './image-format'

/** Image files the pipeline picks up from a directory. */
export const IMAGE_FILE_PATTERN = /\.(jpe?g|png|webp)$/i

/** `image_000`, `image_001`, … in input order. */
export function imageStem(index: number): string {
  return `image_${String(index).padStart(3, '0')}`
}

/**
 * Directory tree of one pipeline run.
 *
 * ```
 * <root>/
 *   images/          uploaded photographs
 *   masks/           binary masks, one per image stem
 *   masked/          RGBA cutouts for the single-image model
 *   reconstruction/  SfM database and sparse/ models
 *   dense/           undistorted images, depth maps, fused cloud
 *   output/          final point clouds and meshes
 * ```
 */
export class WorkspaceLayout {
  readonly images: string
  readonly masks: string
  readonly masked: string
  readonly reconstruction: string
  readonly sparse: string
  readonly database: string
  readonly dense: string
  readonly output: string

  constructor(
    readonly root: string,
    private readonly logger: Logger,
    private readonly maxImages = 5,
  ) {
    this.images = join(root, 'images')
    this.masks = join(root, 'masks')
    this.masked = join(root, 'masked')
    this.reconstruction = join(root, 'reconstruction')
    this.sparse = join(this.reconstruction, 'sparse')
    this.database = join(this.reconstruction, 'database.db')
    this.dense = join(root, 'dense')
    this.output = join(root, 'output')
  }

  /** Workspace for a run: `<workRoot>/request_<runId>`. */
  static forRun(workRoot: string, runId: string, logger: Logger, maxImages?: number): WorkspaceLayout {
    return new WorkspaceLayout(join(workRoot, `request_${runId}`), logger, maxImages)
  }

  /** Create every subdirectory. Idempotent. */
  async ensure(): Promise<void> {
    for (const dir of [this.images, this.masks, this.masked, this.sparse, this.dense, this.output]) {
      await mkdir(dir, { recursive: true })
    }
  }

  /**
   * Write images as `image_NNN.<ext>` in input order. Buffers past the
   * image cap are dropped.
   *
   * @returns Absolute paths of the written files.
   */
  async persistImages(buffers: readonly Uint8Array[]): Promise<string[]> {
    const kept = buffers.slice(0, this.maxImages)
    if (buffers.length > kept.length) {
      this.logger.warn('images_truncated', { received: buffers.length, kept: kept.length })
    }

    const paths: string[] = []
    for (const [i, buffer] of kept.entries()) {
      const image = await prepareImage(buffer, this.logger)
      const path = join(this.images, imageStem(i) + image.ext)
      await writeFile(path, image.data)
      paths.push(path)
    }
    this.logger.info('images_saved', { count: paths.length, directory: this.images })
    return paths
  }

  /** Write pre-supplied masks as `image_NNN.png`, matching image order. */
  async persistMasks(buffers: readonly Uint8Array[]): Promise<string[]> {
    const paths: string[] = []
    for (const [i, buffer] of buffers.slice(0, this.maxImages).entries()) {
      const path = join(this.masks, `${imageStem(i)}.png`)
      await writeFile(path, buffer)
      paths.push(path)
    }
    return paths
  }

  /** Sorted image paths under `images/`. */
  listImages(): Promise<string[]> {
    return listFiles(this.images, IMAGE_FILE_PATTERN)
  }

  /** Sorted PNG paths under `dir` (the binary mask directory by default). */
  listMasks(dir: string = this.masks): Promise<string[]> {
    return listFiles(dir, /\.png$/i)
  }

  /** Masks are usable when at least one mask file exists. */
  async hasUsableMasks(dir: string = this.masks): Promise<boolean> {
    return (await this.listMasks(dir)).length > 0
  }
}

/** Sorted absolute paths of regular files in `dir` whose names match. */
export async function listFiles(dir: string, pattern: RegExp): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isNotFound(err)) return []
    throw err
  }
  return entries
    .filter((e) => e.isFile() && pattern.test(e.name))
    .map((e) => e.name)
    .sort()
    .map((name) => join(dir, name))
}

/** Every regular file under `dir`, recursively, sorted by path. */
export async function listFilesRecursive(dir: string): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    if (isNotFound(err)) return []
    throw err
  }
  const files: string[] = []
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) files.push(...(await listFilesRecursive(path)))
    else if (entry.isFile()) files.push(path)
  }
  return files.sort()
}

/** File name without directory or extension. */
export function stemOf(path: string): string {
  return parse(path).name
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
