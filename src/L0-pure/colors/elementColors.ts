/**
 * Element-type → outline color.
 *
 * Known element families get a fixed color from an ordered rule table; anything
 * else draws from a per-palette sequence of vibrant fallback colors.
 */

export interface ColorRule {
  /** Matched as a substring of the lower-cased element type */
  match: string
  color: string
}

/** Evaluated top to bottom; the first matching rule wins. */
export const ELEMENT_COLOR_RULES: readonly ColorRule[] = Object.freeze([
  { match: 'text', color: '#FF4444' },
  { match: 'button', color: '#44FF44' },
  { match: 'input', color: '#4444FF' },
  { match: 'icon', color: '#FFFF44' },
  { match: 'container', color: '#FF44FF' },
  { match: 'nav', color: '#44FFFF' },
  { match: 'image', color: '#FF8844' },
  { match: 'status', color: '#88FF44' },
  { match: 'modal', color: '#FF4488' },
  { match: 'list', color: '#4488FF' },
])

export const GOLDEN_RATIO_CONJUGATE = 0.618033988749895

const MIN_SATURATION = 0.85
const MIN_VALUE = 0.85

/** Source of uniform numbers in `[0, 1)`. */
export type RandomSource = () => number

/** Color of the first rule whose key occurs in the element type, or undefined. */
export function lookupElementColor(
  elementType: string,
  rules: readonly ColorRule[] = ELEMENT_COLOR_RULES,
): string | undefined {
  const normalized = elementType.toLowerCase()
  return rules.find((rule) => normalized.includes(rule.match))?.color
}

function toHexChannel(channel: number): string {
  return Math.floor(channel * 255).toString(16).padStart(2, '0')
}

/** Convert HSV (each component in `[0, 1]`) to a `#rrggbb` string. */
export function hsvToHex(hue: number, saturation: number, value: number): string {
  let r = value
  let g = value
  let b = value

  if (saturation > 0) {
    const sector = Math.floor(hue * 6)
    const f = hue * 6 - sector
    const p = value * (1 - saturation)
    const q = value * (1 - saturation * f)
    const t = value * (1 - saturation * (1 - f))

    switch (sector % 6) {
      case 0: [r, g, b] = [value, t, p]; break
      case 1: [r, g, b] = [q, value, p]; break
      case 2: [r, g, b] = [p, value, t]; break
      case 3: [r, g, b] = [p, q, value]; break
      case 4: [r, g, b] = [t, p, value]; break
      default: [r, g, b] = [value, p, q]; break
    }
  }

  return `#${toHexChannel(r)}${toHexChannel(g)}${toHexChannel(b)}`
}

/**
 * Hands out colors for element types.
 *
 * Fallback hues advance by the golden-ratio conjugate from a random start so
 * consecutive unknown types land far apart on the color wheel. An unknown type
 * keeps the color it was first given for the lifetime of the palette.
 */
export class ColorPalette {
  private hue: number
  private readonly assigned = new Map<string, string>()

  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly rules: readonly ColorRule[] = ELEMENT_COLOR_RULES,
  ) {
    this.hue = random()
  }

  colorFor(elementType: string | undefined): string {
    const type = (elementType ?? 'unknown').toLowerCase()
    const known = lookupElementColor(type, this.rules)
    if (known) return known

    const existing = this.assigned.get(type)
    if (existing) return existing

    const color = this.nextFallbackColor()
    this.assigned.set(type, color)
    return color
  }

  private nextFallbackColor(): string {
    this.hue = (this.hue + GOLDEN_RATIO_CONJUGATE) % 1
    const saturation = MIN_SATURATION + this.random() * (1 - MIN_SATURATION)
    const value = MIN_VALUE + this.random() * (1 - MIN_VALUE)
    return hsvToHex(this.hue, saturation, value)
  }
}
