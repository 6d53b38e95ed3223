import convert from 'heic-convert'
import sharp from 'sharp'
import type { Logger } from '../logger'
import { errorMessage } from '../errors'

/** Extensions for formats the reconstruction tools read directly. */
const EXTENSIONS: Record<string, string> = {
  jpeg: '.jpg',
  png: '.png',
  webp: '.webp',
}

export const DEFAULT_IMAGE_EXTENSION = '.jpg'

export interface PreparedImage {
  data: Uint8Array
  ext: string
  /** Format sharp detected, if any. */
  format?: string
  /** True when the payload was re-encoded (HEIC/HEIF → JPEG). */
  converted: boolean
}

/** Turns a HEIC/HEIF payload into JPEG bytes, or throws. */
export type HeifDecoder = (data: Uint8Array) => Promise<Uint8Array>

/** libvips' own libheif; prebuilt sharp binaries decode AV1-coded HEIF only. */
export const sharpHeifDecoder: HeifDecoder = async (data) =>
  sharp(data).rotate().jpeg({ quality: 95 }).toBuffer()

/** Pure JavaScript libheif build, which also covers HEVC-coded camera photos. */
export const libheifDecoder: HeifDecoder = async (data) =>
  new Uint8Array(await convert({ buffer: Buffer.from(data), format: 'JPEG', quality: 0.95 }))

export const DEFAULT_HEIF_DECODERS: readonly HeifDecoder[] = [sharpHeifDecoder, libheifDecoder]

/**
 * Pick the on-disk extension for an uploaded image by sniffing its content.
 *
 * HEIC/HEIF is re-encoded as JPEG by the first decoder that succeeds; when
 * none does the bytes are kept as-is under the default extension. Anything
 * sharp cannot identify also gets the default extension.
 */
export async function prepareImage(
  data: Uint8Array,
  logger: Logger,
  heifDecoders: readonly HeifDecoder[] = DEFAULT_HEIF_DECODERS,
): Promise<PreparedImage> {
  let format: string | undefined
  try {
    format = (await sharp(data).metadata()).format
  } catch {
    return { data, ext: DEFAULT_IMAGE_EXTENSION, converted: false }
  }

  if (format === 'heif') {
    for (const [i, decode] of heifDecoders.entries()) {
      try {
        return { data: await decode(data), ext: '.jpg', format, converted: true }
      } catch (err) {
        logger.warn('heic_conversion_failed', { decoder: i, of: heifDecoders.length, error: errorMessage(err) })
      }
    }
    return { data, ext: DEFAULT_IMAGE_EXTENSION, format, converted: false }
  }

  const ext = format !== undefined ? EXTENSIONS[format] : undefined
  return { data, ext: ext ?? DEFAULT_IMAGE_EXTENSION, format, converted: false }
}
