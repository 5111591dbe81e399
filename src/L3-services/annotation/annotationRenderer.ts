/**
 * Annotation Renderer
 *
 * Draws the detections of one image as an SVG overlay composited onto a copy
 * of the source, saved as `ui_analyzed_<basename>` in the original format.
 */

import { sharp } from '../../L1-infra/image/image.js'
import type { OverlayOptions } from '../../L1-infra/image/image.js'
import { ensureDirectory, writeJsonFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { basename, extname, join } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { planAnnotations } from '../../L0-pure/annotation/annotationPlan.js'
import { buildAnnotationSvg } from '../../L0-pure/annotation/svgOverlay.js'
import { ColorPalette } from '../../L0-pure/colors/elementColors.js'
import type { AnnotationPlan, RenderedOutput } from '../../L0-pure/types/index.js'

export const OUTPUT_PREFIX = 'ui_analyzed_'

export interface RenderOptions {
  outputDir: string
  fontFamily?: string
  /** Defaults to a fresh palette per image */
  palette?: ColorPalette
  /** Also write the drawn detections as JSON next to the image */
  writeJson?: boolean
}

export function outputPathFor(imagePath: string, outputDir: string): string {
  return join(outputDir, `${OUTPUT_PREFIX}${basename(imagePath)}`)
}

export function jsonPathFor(imagePath: string, outputDir: string): string {
  const name = basename(imagePath, extname(imagePath))
  return join(outputDir, `${OUTPUT_PREFIX}${name}.json`)
}

function logSkippedBoxes(plan: AnnotationPlan): void {
  for (const box of plan.boxes) {
    if (box.kind !== 'skipped') continue
    if (box.cause === 'invalid') {
      logger.warn(`Warning: Skipping invalid bounding box: ${sanitizeForLog(box.reason)}`)
    } else {
      logger.debug(`[annotation] Skipping ${box.reason}`)
    }
  }
}

/** Drawn detections in both coordinate spaces, for the JSON sidecar */
function toJsonRecords(plan: AnnotationPlan): unknown[] {
  return plan.boxes.flatMap((box) => box.kind === 'drawn'
    ? [{
      ...box.detection,
      color: box.color,
      pixels: [box.rect.x1, box.rect.y1, box.rect.x2, box.rect.y2],
    }]
    : [])
}

/**
 * Annotate one image with its raw detection entries.
 * Malformed entries are skipped with a warning; I/O failures throw.
 */
export async function renderAnnotations(
  imagePath: string,
  entries: readonly unknown[],
  options: RenderOptions,
): Promise<RenderedOutput> {
  const metadata = await sharp(imagePath).metadata()
  const { width, height } = metadata
  if (!width || !height) {
    throw new Error(`Could not read image dimensions: ${imagePath}`)
  }

  const plan = planAnnotations(entries, width, height, {
    palette: options.palette ?? new ColorPalette(),
  })
  logSkippedBoxes(plan)

  const svg = buildAnnotationSvg(plan, { fontFamily: options.fontFamily })
  const outputPath = outputPathFor(imagePath, options.outputDir)

  const overlay: OverlayOptions = { input: Buffer.from(svg), top: 0, left: 0 }

  await ensureDirectory(options.outputDir)
  await sharp(imagePath).composite([overlay]).toFile(outputPath)

  const drawn = plan.boxes.filter((b) => b.kind === 'drawn').length
  const result: RenderedOutput = {
    sourcePath: imagePath,
    outputPath,
    drawn,
    skipped: plan.boxes.length - drawn,
  }

  if (options.writeJson) {
    result.jsonPath = jsonPathFor(imagePath, options.outputDir)
    await writeJsonFile(result.jsonPath, { image: basename(imagePath), width, height, detections: toJsonRecords(plan) })
  }

  logger.info(`Saved annotated UI analysis to: ${sanitizeForLog(outputPath)} (${drawn} boxes)`)
  return result
}
