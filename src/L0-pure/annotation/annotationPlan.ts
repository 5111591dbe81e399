import { validateDetection } from '../detections/detections.js'
import { ColorPalette } from '../colors/elementColors.js'
import type {
  AnnotationPlan,
  BoxPlan,
  Detection,
  LabelFootprint,
  LabelPlacement,
  NormalizedBox,
  PixelRect,
} from '../types/index.js'

/** Boxes narrower or shorter than this (in pixels) are treated as noise. */
export const MIN_BOX_SIZE = 2
export const STROKE_WIDTH = 2
/** Label font size as a fraction of image height */
export const FONT_SCALE = 0.015
/** Used when the scaled size rounds down to nothing */
export const DEFAULT_FONT_SIZE = 11
export const LABEL_PADDING = 2
/** Average advance of a monospace glyph, in ems */
export const CHAR_WIDTH_EM = 0.6
export const UNKNOWN_LABEL = 'Unknown Element'

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max))
}

/**
 * Map a normalized box onto a `width × height` image. Corners are sorted per
 * axis, so swapped coordinates give the same rectangle, then clamped to the
 * image bounds.
 */
export function mapBoxToPixels(bbox: NormalizedBox, width: number, height: number): PixelRect {
  const [nx1, ny1, nx2, ny2] = bbox
  const [x1, x2] = [nx1 * width, nx2 * width].sort((a, b) => a - b)
  const [y1, y2] = [ny1 * height, ny2 * height].sort((a, b) => a - b)

  return {
    x1: clamp(x1, 0, width),
    y1: clamp(y1, 0, height),
    x2: clamp(x2, 0, width),
    y2: clamp(y2, 0, height),
  }
}

export function isDrawable(rect: PixelRect): boolean {
  return rect.x2 - rect.x1 >= MIN_BOX_SIZE && rect.y2 - rect.y1 >= MIN_BOX_SIZE
}

/**
 * Two decimals. Ties that are exact in binary (0.125, 0.625, ...) round to
 * even, where `toFixed` would round them up.
 */
export function formatConfidence(value: number): string {
  const scaled = value * 100
  const isExactTie = Number.isInteger(value * 8) && !Number.isInteger(scaled)
  if (!isExactTie) return value.toFixed(2)

  const lower = Math.floor(Math.abs(scaled))
  const even = lower % 2 === 0 ? lower : lower + 1
  return ((Math.sign(scaled) * even) / 100).toFixed(2)
}

/** `element: label (0.95)`, with each part present only when the detection has it. */
export function formatLabel(detection: Omit<Detection, 'bbox'>): string {
  const parts: string[] = []
  if (detection.element !== undefined) parts.push(detection.element)
  if (detection.label !== undefined) parts.push(`: ${detection.label}`)
  if (detection.confidence !== undefined) parts.push(` (${formatConfidence(detection.confidence)})`)
  return parts.length > 0 ? parts.join('') : UNKNOWN_LABEL
}

export function fontSizeFor(imageHeight: number): number {
  const scaled = Math.floor(imageHeight * FONT_SCALE)
  return scaled >= 1 ? scaled : DEFAULT_FONT_SIZE
}

export function measureLabel(text: string, fontSize: number): LabelFootprint {
  return {
    width: Math.round(text.length * fontSize * CHAR_WIDTH_EM) + LABEL_PADDING * 2,
    height: fontSize + LABEL_PADDING * 2,
  }
}

/**
 * Put the label just above the box, pulled back inside the image when that
 * would run off an edge.
 */
export function placeLabel(
  rect: PixelRect,
  footprint: LabelFootprint,
  width: number,
  height: number,
): LabelPlacement {
  const preferredY = rect.y1 - footprint.height
  const y = Math.max(0, Math.min(Math.max(0, preferredY), height - footprint.height))
  const x = Math.max(0, Math.min(Math.max(0, rect.x1), width - footprint.width))
  return { x, y, width: footprint.width, height: footprint.height }
}

/** Plan one raw model entry onto the image. */
export function planBox(
  raw: unknown,
  width: number,
  height: number,
  fontSize: number,
  palette: ColorPalette,
): BoxPlan {
  const validation = validateDetection(raw)
  if (!validation.ok) {
    return { kind: 'skipped', cause: 'invalid', reason: validation.reason }
  }

  const { detection } = validation
  const rect = mapBoxToPixels(detection.bbox, width, height)
  if (!isDrawable(rect)) {
    return { kind: 'skipped', cause: 'too-small', reason: `box smaller than ${MIN_BOX_SIZE}px` }
  }

  const text = formatLabel(detection)
  const label = placeLabel(rect, measureLabel(text, fontSize), width, height)

  return {
    kind: 'drawn',
    detection,
    rect,
    color: palette.colorFor(detection.element),
    text,
    label,
  }
}

export interface PlanOptions {
  palette?: ColorPalette
}

/** Plan every entry for one image. Each entry is planned independently. */
export function planAnnotations(
  entries: readonly unknown[],
  width: number,
  height: number,
  options: PlanOptions = {},
): AnnotationPlan {
  const palette = options.palette ?? new ColorPalette()
  const fontSize = fontSizeFor(height)
  return {
    width,
    height,
    fontSize,
    boxes: entries.map((entry) => planBox(entry, width, height, fontSize, palette)),
  }
}
