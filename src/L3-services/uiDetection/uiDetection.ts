/**
 * UI Detection
 *
 * One model call per batch. The reply must hold a JSON object keyed by image
 * number; anything that can't be read that way fails the whole batch.
 */

import logger from '../../L1-infra/logger/configLogger.js'
import { parseDetectionResponse } from '../../L0-pure/detections/detections.js'
import type { DetectionMap, ImageBatch } from '../../L0-pure/types/index.js'
import type { VisionModel } from '../../L2-clients/llm/types.js'
import { buildVisionRequest } from '../requestBuilder/requestBuilder.js'
import type { BuildRequestOptions } from '../requestBuilder/requestBuilder.js'

/**
 * Ask the model for the UI elements of every image in the batch.
 *
 * @returns Raw detection entries per image number; entries are validated when drawn
 */
export async function detectElements(
  batch: ImageBatch,
  model: VisionModel,
  options: BuildRequestOptions,
): Promise<DetectionMap> {
  const request = await buildVisionRequest(batch, options)

  logger.info(`Analyzing ${batch.length} image(s) with ${model.name}...`)
  const response = await model.complete(request)
  logger.debug(`[uiDetection] Raw response: ${response.text.slice(0, 500)}`)

  let parsed: ReturnType<typeof parseDetectionResponse>
  try {
    parsed = parseDetectionResponse(response.text)
  } catch (err) {
    logger.warn(`[uiDetection] Unparseable response, raw text: ${response.text.slice(0, 200)}`)
    throw err
  }

  for (const warning of parsed.warnings) {
    logger.warn(`[uiDetection] ${warning}`)
  }

  const total = [...parsed.detections.values()].reduce((sum, entries) => sum + entries.length, 0)
  logger.info(`Successfully extracted ${total} bounding boxes for ${parsed.detections.size} image(s)`)

  return parsed.detections
}
