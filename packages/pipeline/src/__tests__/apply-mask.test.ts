import { describe, it, expect } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import sharp from 'sharp'
import { applyMask, applyMasks } from '../masking/apply-mask'
import { silentLogger } from '../logger'
import { greyMask, jpegImage, pngImage, tempDir } from './fakes'

async function pixels(path: string): Promise<{ channels: number; alpha: number; width: number }> {
  const { data, info } = await sharp(path).raw().toBuffer({ resolveWithObject: true })
  return { channels: info.channels, alpha: data[info.channels - 1] ?? -1, width: info.width }
}

describe('applyMask', () => {
  it('uses mask luminance as alpha, stretched to the image', async () => {
    const dir = await tempDir()
    await writeFile(join(dir, 'image_000.jpg'), await jpegImage())
    await writeFile(join(dir, 'mask.png'), await greyMask(0, 4))

    await applyMask(join(dir, 'image_000.jpg'), join(dir, 'mask.png'), join(dir, 'out.png'))
    expect(await pixels(join(dir, 'out.png'))).toEqual({ channels: 4, alpha: 0, width: 16 })
  })

  it('uses the mask alpha channel when it has one', async () => {
    const dir = await tempDir()
    await writeFile(join(dir, 'image_000.jpg'), await jpegImage())
    // Black but opaque: alpha wins over luminance.
    await writeFile(join(dir, 'mask.png'), await pngImage())

    await applyMask(join(dir, 'image_000.jpg'), join(dir, 'mask.png'), join(dir, 'out.png'))
    expect(await pixels(join(dir, 'out.png'))).toEqual({ channels: 4, alpha: 255, width: 16 })
  })
})

describe('applyMasks', () => {
  it('pairs masks by stem and writes unmatched or unreadable ones uncut', async () => {
    const dir = await tempDir()
    const images = ['image_000.jpg', 'image_001.jpg', 'image_002.jpg'].map((f) => join(dir, f))
    for (const image of images) await writeFile(image, await jpegImage())
    await writeFile(join(dir, 'image_000.png'), await greyMask(0))
    await writeFile(join(dir, 'image_001.png'), 'not a png')
    const out = await tempDir()

    const result = await applyMasks(images, [join(dir, 'image_000.png'), join(dir, 'image_001.png')], out, silentLogger)

    expect(result).toEqual({ success: true, processed: 1, failed: 2, total: 3, partialSuccess: true })
    expect((await pixels(join(out, 'image_000.png'))).alpha).toBe(0)
    expect((await pixels(join(out, 'image_001.png'))).alpha).toBe(255)
    expect((await pixels(join(out, 'image_002.png'))).alpha).toBe(255)
  })
})
