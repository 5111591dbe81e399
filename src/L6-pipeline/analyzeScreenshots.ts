/**
 * Screenshot analysis pipeline: resolve the batch, ask the model once, then
 * annotate each image the response covers.
 *
 * Input and model errors fail the whole run; a failing image is recorded and
 * the remaining images still render.
 */

import logger, { sanitizeForLog } from '../L1-infra/logger/configLogger.js'
import { getConfig } from '../L1-infra/config/environment.js'
import { createVisionModel } from '../L2-clients/llm/ClaudeVisionModel.js'
import type { VisionModel } from '../L2-clients/llm/types.js'
import { resolveImageBatch } from '../L3-services/requestBuilder/requestBuilder.js'
import { detectElements } from '../L3-services/uiDetection/uiDetection.js'
import { renderAnnotations } from '../L3-services/annotation/annotationRenderer.js'
import type { RenderOptions } from '../L3-services/annotation/annotationRenderer.js'
import type { AnalysisSummary, ImageFailure, RenderedOutput } from '../L0-pure/types/index.js'

export interface AnalyzeOptions {
  /** Defaults to the configured Claude model */
  model?: VisionModel
  outputDir?: string
  maxTokens?: number
  fontFamily?: string
  writeJson?: boolean
  /** Renderer override, mainly for tests */
  render?: (imagePath: string, entries: readonly unknown[], options: RenderOptions) => Promise<RenderedOutput>
}

export async function analyzeScreenshots(
  inputPath: string,
  options: AnalyzeOptions = {},
): Promise<AnalysisSummary> {
  const config = getConfig()
  const batch = await resolveImageBatch(inputPath)
  logger.info(`Processing ${batch.length} images...`)

  const model = options.model ?? createVisionModel()
  const detections = await detectElements(batch, model, {
    maxTokens: options.maxTokens ?? config.MAX_TOKENS,
  })

  const render = options.render ?? renderAnnotations
  const renderOptions: RenderOptions = {
    outputDir: options.outputDir ?? config.OUTPUT_DIR,
    fontFamily: options.fontFamily ?? config.FONT_FAMILY,
    writeJson: options.writeJson ?? config.WRITE_JSON,
  }

  const rendered: RenderedOutput[] = []
  const failures: ImageFailure[] = []
  const byIndex = new Map(batch.map((image) => [image.index, image]))

  const indices = [...detections.keys()].sort((a, b) => a - b)
  for (const index of indices) {
    const image = byIndex.get(index)
    if (!image) {
      logger.warn(`Response has detections for image ${index}, but the batch has ${batch.length} image(s)`)
      continue
    }

    try {
      rendered.push(await render(image.path, detections.get(index) ?? [], renderOptions))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error(`Error drawing UI annotations for ${sanitizeForLog(image.path)}: ${message}`)
      failures.push({ imagePath: image.path, error: message })
    }
  }

  for (const image of batch) {
    if (!detections.has(image.index)) {
      logger.warn(`No detections returned for image ${image.index}: ${sanitizeForLog(image.path)}`)
    }
  }

  return { imageCount: batch.length, rendered, failures }
}
