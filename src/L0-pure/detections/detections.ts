import type { Detection, DetectionMap, DetectionValidation, NormalizedBox } from '../types/index.js'

export interface ParsedDetectionResponse {
  detections: DetectionMap
  /** Entries dropped while reading the response shape */
  warnings: string[]
}

/**
 * Cut the JSON object out of free-form model text: everything from the first
 * `{` to the last `}` inclusive, then parse it.
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{')
  const end = text.lastIndexOf('}')
  if (start < 0 || end <= start) {
    throw new Error('No valid JSON found in response')
  }

  try {
    return JSON.parse(text.slice(start, end + 1))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new Error(`Model response is not valid JSON: ${message}`)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read `{ "<image number>": [ ...detections ], ... }` from the model text.
 * Throws when no JSON object can be read; drops malformed keys and values
 * with a warning instead.
 */
export function parseDetectionResponse(text: string): ParsedDetectionResponse {
  const parsed = extractJsonObject(text)
  if (!isRecord(parsed)) {
    throw new Error('Model response JSON is not an object keyed by image number')
  }

  const detections: DetectionMap = new Map()
  const warnings: string[] = []

  for (const [key, value] of Object.entries(parsed)) {
    const index = Number(key.trim())
    if (!/^\d+$/.test(key.trim()) || !Number.isSafeInteger(index) || index < 1) {
      warnings.push(`Ignoring response key "${key}": not an image number`)
      continue
    }
    if (!Array.isArray(value)) {
      warnings.push(`Ignoring detections for image ${index}: expected an array`)
      continue
    }
    detections.set(index, value)
  }

  return { detections, warnings }
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function toNormalizedBox(value: unknown): NormalizedBox | null {
  if (!Array.isArray(value) || value.length !== 4) return null
  const [x1, y1, x2, y2]: unknown[] = value
  if (!isFiniteNumber(x1) || !isFiniteNumber(y1) || !isFiniteNumber(x2) || !isFiniteNumber(y2)) {
    return null
  }
  return [x1, y1, x2, y2]
}

/** Check one raw entry from the model. Invalid entries carry the reason they were rejected. */
export function validateDetection(raw: unknown): DetectionValidation {
  if (!isRecord(raw)) {
    return { ok: false, reason: 'detection is not an object' }
  }
  if (!('bbox' in raw)) {
    return { ok: false, reason: 'missing bbox' }
  }

  const bbox = toNormalizedBox(raw.bbox)
  if (!bbox) {
    return { ok: false, reason: `invalid bbox ${JSON.stringify(raw.bbox)}` }
  }

  const detection: Detection = { bbox }
  if (typeof raw.element === 'string') detection.element = raw.element
  if (typeof raw.label === 'string') detection.label = raw.label
  if (isFiniteNumber(raw.confidence)) detection.confidence = raw.confidence

  return { ok: true, detection }
}
