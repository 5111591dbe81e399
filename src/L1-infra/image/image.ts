import sharp from 'sharp'

export { sharp }
export type { OverlayOptions } from 'sharp'
