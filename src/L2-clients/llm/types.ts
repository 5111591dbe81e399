/**
 * Vision Model Abstraction Layer
 *
 * Defines the contract for multimodal models that turn an ordered list of
 * text and image parts plus a system prompt into a text reply.
 */

/** Supported image MIME types */
export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp'

export interface TextPart {
  type: 'text'
  text: string
}

export interface ImagePart {
  type: 'image'
  mimeType: ImageMimeType
  /** base64 WITHOUT a data: URL prefix */
  data: string
}

export type VisionContentPart = TextPart | ImagePart

/** One request to a vision model */
export interface VisionRequest {
  systemPrompt: string
  content: VisionContentPart[]
  maxTokens: number
}

/** Token usage for a single model call */
export interface TokenUsage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
}

/** Response from a vision model call */
export interface VisionResponse {
  /** Text content of the response */
  text: string
  usage: TokenUsage
  /** Model that served the request */
  model: string
  /** Duration of the call in milliseconds */
  durationMs: number
}

export interface VisionModel {
  readonly name: string
  complete(request: VisionRequest): Promise<VisionResponse>
}
