/**
 * Image utilities for vision requests.
 *
 * Handles MIME detection from file extensions and base64 encoding.
 */

import { readFileBuffer } from '../../L1-infra/fileSystem/fileSystem.js'
import { extname } from '../../L1-infra/paths/paths.js'
import type { ImageMimeType } from './types.js'

/** An image file encoded for a vision request */
export interface EncodedImage {
  base64: string
  mimeType: ImageMimeType
  path: string
}

/** Get MIME type from file extension. Unrecognized extensions are sent as JPEG. */
export function getMimeType(filePath: string): ImageMimeType {
  const ext = extname(filePath).toLowerCase()
  switch (ext) {
    case '.png':
      return 'image/png'
    case '.gif':
      return 'image/gif'
    case '.webp':
      return 'image/webp'
    case '.jpg':
    case '.jpeg':
    default:
      return 'image/jpeg'
  }
}

/** Read and base64-encode an image. Throws if the file can't be read. */
export async function encodeImage(imagePath: string): Promise<EncodedImage> {
  const buffer = await readFileBuffer(imagePath)
  return {
    base64: buffer.toString('base64'),
    mimeType: getMimeType(imagePath),
    path: imagePath,
  }
}
