import { describe, it, expect } from 'vitest'
import {
  DEFAULT_FONT_SIZE,
  UNKNOWN_LABEL,
  fontSizeFor,
  formatConfidence,
  formatLabel,
  isDrawable,
  mapBoxToPixels,
  measureLabel,
  placeLabel,
  planAnnotations,
} from '../../../L0-pure/annotation/annotationPlan.js'
import { ColorPalette } from '../../../L0-pure/colors/elementColors.js'
import type { NormalizedBox } from '../../../L0-pure/types/index.js'

// ============================================================================
// Coordinate mapping
// ============================================================================
describe('mapBoxToPixels', () => {
  it('scales normalized corners by width and height', () => {
    expect(mapBoxToPixels([0.25, 0.5, 0.75, 1], 200, 100)).toEqual({ x1: 50, y1: 50, x2: 150, y2: 100 })
  })

  it('gives the same rectangle when corners are swapped', () => {
    const expected = { x1: 50, y1: 50, x2: 150, y2: 100 }
    expect(mapBoxToPixels([0.75, 0.5, 0.25, 1], 200, 100)).toEqual(expected)
    expect(mapBoxToPixels([0.25, 1, 0.75, 0.5], 200, 100)).toEqual(expected)
    expect(mapBoxToPixels([0.75, 1, 0.25, 0.5], 200, 100)).toEqual(expected)
  })

  it('clamps coordinates outside the image', () => {
    expect(mapBoxToPixels([-0.5, -0.25, 1.5, 2], 200, 100)).toEqual({ x1: 0, y1: 0, x2: 200, y2: 100 })
  })

  it('keeps every mapped box inside the image bounds', () => {
    const boxes: NormalizedBox[] = [
      [0, 0, 1, 1],
      [0.1234, 0.5678, 0.9876, 0.6543],
      [0.9999, 0.0001, 1, 0.0002],
      [0.3333, 0.3333, 0.6667, 0.6667],
    ]
    for (const box of boxes) {
      const rect = mapBoxToPixels(box, 1366, 768)
      expect(rect.x1).toBeGreaterThanOrEqual(0)
      expect(rect.x1).toBeLessThanOrEqual(rect.x2)
      expect(rect.x2).toBeLessThanOrEqual(1366)
      expect(rect.y1).toBeGreaterThanOrEqual(0)
      expect(rect.y1).toBeLessThanOrEqual(rect.y2)
      expect(rect.y2).toBeLessThanOrEqual(768)
    }
  })
})

describe('isDrawable', () => {
  it('accepts boxes of exactly 2px', () => {
    expect(isDrawable({ x1: 10, y1: 10, x2: 12, y2: 12 })).toBe(true)
  })

  it('rejects boxes under 2px in either dimension', () => {
    expect(isDrawable({ x1: 10, y1: 10, x2: 11.5, y2: 50 })).toBe(false)
    expect(isDrawable({ x1: 10, y1: 10, x2: 50, y2: 11 })).toBe(false)
  })
})

// ============================================================================
// Labels
// ============================================================================
describe('formatLabel', () => {
  it('joins element, label and confidence', () => {
    expect(formatLabel({ element: 'button-primary', label: 'Submit', confidence: 0.95 }))
      .toBe('button-primary: Submit (0.95)')
  })

  it('formats confidence with two decimals', () => {
    expect(formatLabel({ element: 'icon', confidence: 0.5 })).toBe('icon (0.50)')
    expect(formatLabel({ element: 'icon', confidence: 1 })).toBe('icon (1.00)')
  })

  it('rounds exact binary ties to even', () => {
    expect(formatConfidence(0.125)).toBe('0.12')
    expect(formatConfidence(0.375)).toBe('0.38')
    expect(formatConfidence(0.625)).toBe('0.62')
    expect(formatConfidence(0.875)).toBe('0.88')
    expect(formatConfidence(-0.125)).toBe('-0.12')
    expect(formatLabel({ element: 'icon', confidence: 0.625 })).toBe('icon (0.62)')
  })

  it('rounds other values to the nearest hundredth', () => {
    expect(formatConfidence(0.95)).toBe('0.95')
    expect(formatConfidence(0.25)).toBe('0.25')
    expect(formatConfidence(0.876)).toBe('0.88')
    expect(formatConfidence(0.333)).toBe('0.33')
  })

  it('omits missing parts', () => {
    expect(formatLabel({ element: 'logo' })).toBe('logo')
    expect(formatLabel({ label: 'Submit' })).toBe(': Submit')
  })

  it('falls back to the placeholder when everything is missing', () => {
    expect(formatLabel({})).toBe(UNKNOWN_LABEL)
    expect(UNKNOWN_LABEL).toBe('Unknown Element')
  })
})

describe('fontSizeFor', () => {
  it('scales to 1.5% of the image height', () => {
    expect(fontSizeFor(1000)).toBe(15)
    expect(fontSizeFor(400)).toBe(6)
  })

  it('falls back to the default size for tiny images', () => {
    expect(fontSizeFor(50)).toBe(DEFAULT_FONT_SIZE)
  })
})

describe('measureLabel', () => {
  it('estimates monospace width plus padding', () => {
    // 4 chars × 10px × 0.6 = 24, plus 2px padding on each side
    expect(measureLabel('abcd', 10)).toEqual({ width: 28, height: 14 })
  })
})

describe('placeLabel', () => {
  const footprint = { width: 28, height: 14 }

  it('sits just above the box', () => {
    expect(placeLabel({ x1: 50, y1: 50, x2: 100, y2: 80 }, footprint, 200, 100))
      .toEqual({ x: 50, y: 36, width: 28, height: 14 })
  })

  it('never goes above the image', () => {
    expect(placeLabel({ x1: 50, y1: 5, x2: 100, y2: 80 }, footprint, 200, 100).y).toBe(0)
  })

  it('never runs off the right edge', () => {
    expect(placeLabel({ x1: 190, y1: 50, x2: 200, y2: 80 }, footprint, 200, 100).x).toBe(172)
  })

  it('stays at the origin when the label is larger than the image', () => {
    expect(placeLabel({ x1: 50, y1: 50, x2: 100, y2: 80 }, { width: 300, height: 120 }, 200, 100))
      .toEqual({ x: 0, y: 0, width: 300, height: 120 })
  })
})

// ============================================================================
// Planning
// ============================================================================
describe('planAnnotations', () => {
  it('plans a labeled, colored box', () => {
    const plan = planAnnotations(
      [{ element: 'button-primary', label: 'Submit', bbox: [0.1, 0.1, 0.3, 0.2], confidence: 0.95 }],
      1000,
      800,
    )

    expect(plan.fontSize).toBe(12)
    expect(plan.boxes).toHaveLength(1)
    const box = plan.boxes[0]
    if (box.kind !== 'drawn') throw new Error('expected a drawn box')

    expect(box.color).toBe('#44FF44')
    expect(box.text).toBe('button-primary: Submit (0.95)')
    expect(box.rect.x1).toBeCloseTo(100)
    expect(box.rect.y1).toBeCloseTo(80)
    expect(box.rect.x2).toBeCloseTo(300)
    expect(box.rect.y2).toBeCloseTo(160)
    // 29 chars × 12px × 0.6 = 208.8 → 209, + 4 padding; height 12 + 4
    expect(box.label).toEqual({ x: 100, y: 64, width: 213, height: 16 })
  })

  it('skips boxes under 2px without a label', () => {
    const plan = planAnnotations([{ element: 'icon', bbox: [0.5, 0.5, 0.505, 0.9] }], 200, 100)
    expect(plan.boxes).toEqual([{ kind: 'skipped', cause: 'too-small', reason: 'box smaller than 2px' }])
  })

  it('skips malformed entries and keeps planning the rest', () => {
    const plan = planAnnotations(
      [{ bbox: 'bad' }, null, { element: 'icon', bbox: [0.25, 0.5, 0.75, 1] }],
      200,
      100,
    )

    expect(plan.boxes.map((b) => b.kind)).toEqual(['skipped', 'skipped', 'drawn'])
    expect(plan.boxes[0]).toEqual({ kind: 'skipped', cause: 'invalid', reason: 'invalid bbox "bad"' })
    expect(plan.boxes[1]).toEqual({ kind: 'skipped', cause: 'invalid', reason: 'detection is not an object' })
  })

  it('labels a detection without label and confidence as Unknown Element', () => {
    const plan = planAnnotations([{ bbox: [0.25, 0.5, 0.75, 1] }], 200, 100)
    const box = plan.boxes[0]
    expect(box.kind).toBe('drawn')
    if (box.kind === 'drawn') expect(box.text).toBe('Unknown Element')
  })

  it('uses the injected palette for unknown element types', () => {
    const plan = planAnnotations(
      [{ element: 'checkbox', bbox: [0.25, 0.5, 0.75, 1] }],
      200,
      100,
      { palette: new ColorPalette(() => 0.5) },
    )
    const box = plan.boxes[0]
    if (box.kind !== 'drawn') throw new Error('expected a drawn box')
    expect(box.color).toBe('#ebac11')
  })
})
