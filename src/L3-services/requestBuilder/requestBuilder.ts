/**
 * Request Builder
 *
 * Turns an input path into an ordered image batch, then the batch into a
 * single multimodal request: `Image N:` markers interleaved with the encoded
 * images, plus the fixed detection instruction.
 */

import { fileExists, getFileStats, listDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { extname, join } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { encodeImage } from '../../L2-clients/llm/imageUtils.js'
import type { VisionContentPart, VisionRequest } from '../../L2-clients/llm/types.js'
import { SUPPORTED_IMAGE_EXTENSIONS } from '../../L0-pure/types/index.js'
import type { ImageBatch } from '../../L0-pure/types/index.js'

export const UI_DETECTION_PROMPT = `You are a UI element detection system. Locate every visual component in the user interface screenshots you are given.

Each screenshot is preceded by a marker of the form "Image N:". Report the elements of each screenshot under its number N.

OUTPUT FORMAT (return ONLY this JSON object, no markdown fences, no explanation):
{
  "1": [
    {
      "element": "element-type",
      "label": "visible text or purpose of the element",
      "bbox": [x1, y1, x2, y2],
      "confidence": 0.95
    }
  ],
  "2": []
}

BOUNDING BOXES:
- Coordinates are normalized to the image: 0.0 is the left/top edge, 1.0 the right/bottom edge
- Use 4 decimal places
- Always x2 > x1 and y2 > y1
- Boxes wrap the element tightly: the full clickable area for buttons, the border and padding for inputs, the glyph bounds for text, the artwork for icons
- Report containers and the elements nested inside them separately
- confidence is a number between 0 and 1

ELEMENT TYPES:
- Page structure: header, main-content, sidebar, footer
- Navigation: nav-bar, nav-item, nav-dropdown, breadcrumb
- Content: heading-1, heading-2, heading-3, paragraph-text, list-item, table-cell
- Interactive: button-primary, button-secondary, input-field, checkbox, radio-button, dropdown-select
- Media: icon, image, avatar, logo
- Status and feedback: alert-message, progress-bar, loading-spinner, tooltip, badge, modal-dialog

Use the closest type from the list; invent a descriptive kebab-case type only when none fits.
Detect every element, however small. Return valid JSON only.`

export interface BuildRequestOptions {
  maxTokens: number
}

const IMAGE_EXTENSIONS: readonly string[] = SUPPORTED_IMAGE_EXTENSIONS

function isSupportedExtension(fileName: string): boolean {
  // Case-sensitive: "shot.PNG" is not picked up from a directory
  return IMAGE_EXTENSIONS.includes(extname(fileName))
}

/** Sort by extension group in IMAGE_EXTENSIONS order, then by name */
function compareImageFiles(a: string, b: string): number {
  const groupA = IMAGE_EXTENSIONS.indexOf(extname(a))
  const groupB = IMAGE_EXTENSIONS.indexOf(extname(b))
  if (groupA !== groupB) return groupA - groupB
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Resolve a file or directory path into an ordered batch, indexed from 1.
 * A directory contributes its supported images; a file is taken as-is.
 */
export async function resolveImageBatch(inputPath: string): Promise<ImageBatch> {
  if (!(await fileExists(inputPath))) {
    throw new Error(`Image path does not exist: ${inputPath}`)
  }

  const stats = await getFileStats(inputPath)
  if (!stats.isDirectory()) {
    return [{ index: 1, path: inputPath }]
  }

  const entries = await listDirectory(inputPath)
  const candidates = entries.filter(isSupportedExtension).sort(compareImageFiles)

  const files: string[] = []
  for (const name of candidates) {
    const fullPath = join(inputPath, name)
    if ((await getFileStats(fullPath)).isFile()) files.push(fullPath)
  }

  if (files.length === 0) {
    throw new Error(`No supported images found in directory ${inputPath}`)
  }

  return files.map((path, i) => ({ index: i + 1, path }))
}

/**
 * Encode every image of the batch into one request. Images that can't be read
 * are logged and left out; the others keep their batch number.
 */
export async function buildVisionRequest(
  batch: ImageBatch,
  options: BuildRequestOptions,
): Promise<VisionRequest> {
  const content: VisionContentPart[] = []

  for (const image of batch) {
    logger.info(`Processing image ${image.index}: ${sanitizeForLog(image.path)}`)
    try {
      const encoded = await encodeImage(image.path)
      content.push({ type: 'text', text: `Image ${image.index}:` })
      content.push({ type: 'image', mimeType: encoded.mimeType, data: encoded.base64 })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      logger.error(`Error reading image ${sanitizeForLog(image.path)}: ${message}`)
    }
  }

  if (content.length === 0) {
    throw new Error(`None of the ${batch.length} images could be read`)
  }

  return {
    systemPrompt: UI_DETECTION_PROMPT,
    content,
    maxTokens: options.maxTokens,
  }
}
