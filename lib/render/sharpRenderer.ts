import sharp from 'sharp'
import { CONSTANTS } from '../constants/enums'
import { stampedOutputPath } from '../files/rename'
import type { StampRenderer } from '../stamp/dispatchStamps'
import type { PhotoRef } from '../types'

export interface SharpRendererOptions {
  /** Turn landscape shots upright (90° clockwise) before stamping */
  rotateLandscape?: boolean
  maxDimension?: number
  outputPath?: (photoPath: string) => string
}

export interface StampLayout {
  fontSize: number
  paddingX: number
  paddingY: number
  lineGap: number
}

export function computeLayout(width: number, height: number): StampLayout {
  const fontSize = Math.max(1, Math.floor(height * CONSTANTS.STAMP_FONT_RATIO))
  return {
    fontSize,
    paddingX: width * CONSTANTS.STAMP_PADDING_RATIO,
    paddingY: height * CONSTANTS.STAMP_PADDING_RATIO,
    lineGap: fontSize * CONSTANTS.STAMP_LINE_GAP_RATIO
  }
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

/**
 * White bold text block anchored to the top-right corner.
 * First line is the timestamp; multi-line locations follow one per line.
 */
export function buildStampSvg(width: number, height: number, lines: readonly string[]): string {
  const { fontSize, paddingX, paddingY, lineGap } = computeLayout(width, height)
  const x = (width - paddingX).toFixed(1)

  const texts = lines.map((line, index) => {
    const y = (paddingY + fontSize + index * (fontSize + lineGap)).toFixed(1)
    return `<text x="${x}" y="${y}">${escapeXml(line)}</text>`
  })

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<g font-family="${CONSTANTS.STAMP_FONT_FAMILY}" font-size="${fontSize}" font-weight="bold" fill="#ffffff" text-anchor="end">`,
    ...texts,
    '</g>',
    '</svg>'
  ].join('')
}

export function stampLines(formattedTimestamp: string, location: string): string[] {
  return [formattedTimestamp, ...location.split('\n')].filter(line => line.length > 0)
}

export function createSharpRenderer(options: SharpRendererOptions = {}): StampRenderer {
  const rotateLandscape = options.rotateLandscape ?? true
  const maxDimension = options.maxDimension ?? CONSTANTS.STAMP_MAX_DIMENSION
  const outputPath = options.outputPath ?? stampedOutputPath

  return {
    async render(photo: PhotoRef, formattedTimestamp: string, location: string): Promise<void> {
      // Bake EXIF orientation first so width/height describe what is displayed
      const oriented = await sharp(photo.path).rotate().toBuffer({ resolveWithObject: true })

      let pipeline = sharp(oriented.data)
      if (rotateLandscape && oriented.info.width > oriented.info.height) {
        pipeline = pipeline.rotate(90)
      }

      const base = await pipeline
        .resize({ width: maxDimension, height: maxDimension, fit: 'inside', withoutEnlargement: true })
        .toBuffer({ resolveWithObject: true })

      const { width, height } = base.info
      const svg = buildStampSvg(width, height, stampLines(formattedTimestamp, location))
      const target = outputPath(photo.path)

      await sharp(base.data)
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .png()
        .toFile(target)

      console.log(`✅ Saved stamped image: ${target}`)
    }
  }
}
