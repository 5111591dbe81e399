import { LABEL_PADDING, STROKE_WIDTH } from './annotationPlan.js'
import type { AnnotationPlan } from '../types/index.js'

/** 180/255, the label background alpha */
export const LABEL_BACKGROUND_OPACITY = 0.706
export const DEFAULT_FONT_FAMILY = 'DejaVu Sans Mono, Menlo, Consolas, monospace'

/** Share of the font size that sits above the baseline */
const ASCENT_RATIO = 0.8

/** Code points XML 1.0 does not allow in character data, even as references */
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g

export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export interface SvgOverlayOptions {
  fontFamily?: string
}

/**
 * Render the drawn boxes of a plan as an SVG the size of the image. Each box
 * contributes its outline, then a dark label background, then the label text,
 * so later boxes paint over earlier ones.
 */
export function buildAnnotationSvg(plan: AnnotationPlan, options: SvgOverlayOptions = {}): string {
  const fontFamily = escapeXml(options.fontFamily ?? DEFAULT_FONT_FAMILY)
  const elements: string[] = []

  for (const box of plan.boxes) {
    if (box.kind !== 'drawn') continue
    const { rect, label, color } = box

    elements.push(
      `<rect x="${rect.x1}" y="${rect.y1}" width="${rect.x2 - rect.x1}" height="${rect.y2 - rect.y1}" fill="none" stroke="${color}" stroke-width="${STROKE_WIDTH}"/>`,
    )
    elements.push(
      `<rect x="${label.x}" y="${label.y}" width="${label.width}" height="${label.height}" fill="#000000" fill-opacity="${LABEL_BACKGROUND_OPACITY}"/>`,
    )
    const baseline = label.y + LABEL_PADDING + Math.round(plan.fontSize * ASCENT_RATIO)
    elements.push(
      `<text x="${label.x + LABEL_PADDING}" y="${baseline}" font-size="${plan.fontSize}" font-family="${fontFamily}" fill="${color}" xml:space="preserve">${escapeXml(box.text)}</text>`,
    )
  }

  return `<svg width="${plan.width}" height="${plan.height}" xmlns="http://www.w3.org/2000/svg">${elements.join('\n')}</svg>`
}
