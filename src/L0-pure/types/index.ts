/**
 * Shared domain types.
 *
 * Pure type definitions only — no runtime I/O. Everything from the model
 * response to the rendered output flows through these shapes.
 */

// ============================================================================
// DETECTIONS
// ============================================================================

/** Normalized `[x1, y1, x2, y2]` rectangle, each value a fraction of width/height. */
export type NormalizedBox = [number, number, number, number]

/** One UI element reported by the model, after per-box validation. */
export interface Detection {
  element?: string
  label?: string
  bbox: NormalizedBox
  confidence?: number
}

/** Image index (1-based, matching the `Image N:` markers) → raw detection entries. */
export type DetectionMap = Map<number, unknown[]>

export type DetectionValidation =
  | { ok: true; detection: Detection }
  | { ok: false; reason: string }

// ============================================================================
// BATCHES
// ============================================================================

export interface BatchImage {
  /** 1-based position in the batch */
  index: number
  path: string
}

export type ImageBatch = BatchImage[]

export const SUPPORTED_IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp'] as const

// ============================================================================
// GEOMETRY & RENDERING
// ============================================================================

/** Pixel rectangle with `x1 <= x2` and `y1 <= y2`. */
export interface PixelRect {
  x1: number
  y1: number
  x2: number
  y2: number
}

export interface LabelFootprint {
  width: number
  height: number
}

export interface LabelPlacement {
  x: number
  y: number
  width: number
  height: number
}

/** `invalid` entries are malformed; `too-small` ones map to under 2px and count as noise. */
export type SkipCause = 'invalid' | 'too-small'

/** Result of planning a single detection onto a concrete image. */
export type BoxPlan =
  | {
    kind: 'drawn'
    detection: Detection
    rect: PixelRect
    color: string
    text: string
    label: LabelPlacement
  }
  | { kind: 'skipped'; cause: SkipCause; reason: string }

export interface AnnotationPlan {
  width: number
  height: number
  fontSize: number
  boxes: BoxPlan[]
}

export interface RenderedOutput {
  sourcePath: string
  outputPath: string
  drawn: number
  skipped: number
  /** Path of the detections JSON, when one was written */
  jsonPath?: string
}

export interface ImageFailure {
  imagePath: string
  error: string
}

export interface AnalysisSummary {
  imageCount: number
  rendered: RenderedOutput[]
  failures: ImageFailure[]
}
