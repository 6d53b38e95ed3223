import { join } from 'node:path'
import sharp from 'sharp'
import type { Logger } from '../logger'
import { errorMessage } from '../errors'
import { stemOf } from '../workspace/layout'
import type { DirectoryMaskResult } from './background-masker'

/**
 * Cut `imagePath` out with a binary mask, writing an RGBA PNG to `outputPath`.
 *
 * The mask's alpha channel is used when it has one, its luminance otherwise.
 * It is stretched to the image's size first.
 */
export async function applyMask(imagePath: string, maskPath: string, outputPath: string): Promise<void> {
  const { width, height } = await sharp(imagePath).metadata()
  if (!width || !height) throw new Error(`Cannot read image size of ${imagePath}`)

  const mask = sharp(maskPath)
  const { hasAlpha } = await mask.metadata()
  const alpha = await (hasAlpha ? mask.extractChannel('alpha') : mask.toColourspace('b-w'))
    .resize(width, height, { fit: 'fill' })
    .raw()
    .toBuffer()

  await sharp(imagePath)
    .removeAlpha()
    .joinChannel(alpha, { raw: { width, height, channels: 1 } })
    .png()
    .toFile(outputPath)
}

/**
 * Write `<stem>.png` cutouts for every image into `outputDir`, pairing each
 * image with the mask of the same stem. Images without a usable mask are
 * written uncut so the set stays complete.
 */
export async function applyMasks(
  images: readonly string[],
  masks: readonly string[],
  outputDir: string,
  logger: Logger,
): Promise<DirectoryMaskResult> {
  const byStem = new Map(masks.map((m) => [stemOf(m), m]))
  let processed = 0
  let failed = 0

  for (const image of images) {
    const outputPath = join(outputDir, `${stemOf(image)}.png`)
    const mask = byStem.get(stemOf(image))
    if (mask) {
      try {
        await applyMask(image, mask, outputPath)
        processed++
        continue
      } catch (err) {
        logger.warn('mask_apply_failed', { image: stemOf(image), error: errorMessage(err) })
      }
    }
    failed++
    await sharp(image).ensureAlpha().png().toFile(outputPath)
  }

  logger.info('masks_applied', { processed, failed })
  return {
    success: processed > 0,
    processed,
    failed,
    total: images.length,
    partialSuccess: processed > 0 && failed > 0,
  }
}
