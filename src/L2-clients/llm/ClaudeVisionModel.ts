/**
 * Claude (Anthropic) Vision Model
 *
 * Wraps the Anthropic Messages API behind the VisionModel interface.
 * One request = one user message of interleaved text and base64 image blocks.
 */

import { createAnthropic } from './ai.js'
import type { Anthropic } from './ai.js'
import type {
  ContentBlock,
  ImageBlockParam,
  TextBlock,
  TextBlockParam,
} from '../../L1-infra/ai/anthropic.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { VisionContentPart, VisionModel, VisionRequest, VisionResponse } from './types.js'

export interface ClaudeVisionOptions {
  model?: string
  /** Abort the request after this many milliseconds; 0 or unset waits indefinitely */
  timeoutMs?: number
}

/** Extract text content from Anthropic response content blocks */
function extractText(content: ContentBlock[]): string {
  return content
    .filter((b): b is TextBlock => b.type === 'text')
    .map((b) => b.text)
    .join('')
}

/** Convert our content parts to Anthropic content blocks, preserving order */
export function toAnthropicContent(parts: VisionContentPart[]): (TextBlockParam | ImageBlockParam)[] {
  return parts.map((part): TextBlockParam | ImageBlockParam => {
    if (part.type === 'text') {
      return { type: 'text', text: part.text }
    }
    return {
      type: 'image',
      source: {
        type: 'base64',
        media_type: part.mimeType,
        data: part.data,
      },
    }
  })
}

export class ClaudeVisionModel implements VisionModel {
  readonly name = 'claude' as const
  private client: Anthropic
  private model: string
  private timeoutMs?: number

  constructor(client: Anthropic, options: ClaudeVisionOptions = {}) {
    this.client = client
    this.model = options.model ?? getConfig().LLM_MODEL
    this.timeoutMs = options.timeoutMs
  }

  async complete(request: VisionRequest): Promise<VisionResponse> {
    const model = this.model
    const imageCount = request.content.filter((p) => p.type === 'image').length
    logger.info(`[Claude] Sending ${imageCount} image(s) (model: ${model}, max tokens: ${request.maxTokens})`)

    const startMs = Date.now()
    const controller = new AbortController()
    const timeoutId = this.timeoutMs
      ? setTimeout(() => controller.abort(), this.timeoutMs)
      : undefined

    let response: Anthropic.Message
    try {
      response = await this.client.messages.create(
        {
          model,
          max_tokens: request.maxTokens,
          system: request.systemPrompt,
          messages: [{ role: 'user', content: toAnthropicContent(request.content) }],
        },
        { signal: controller.signal },
      )
    } finally {
      if (timeoutId) clearTimeout(timeoutId)
    }

    const inputTokens = response.usage.input_tokens
    const outputTokens = response.usage.output_tokens
    logger.info(`[Claude] Response received. Tokens: ${inputTokens} in / ${outputTokens} out`)

    const text = extractText(response.content)
    if (!text) {
      throw new Error('Claude returned no text content')
    }
    if (response.stop_reason === 'max_tokens') {
      logger.warn(`[Claude] Response hit the ${request.maxTokens} token limit and may be truncated`)
    }

    return {
      text,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      model,
      durationMs: Date.now() - startMs,
    }
  }
}

/**
 * Create the configured vision model.
 * Throws if the API key is missing.
 */
export function createVisionModel(options: ClaudeVisionOptions = {}): VisionModel {
  const config = getConfig()
  if (!config.ANTHROPIC_API_KEY) {
    throw new Error(
      'ANTHROPIC_API_KEY not found. Set it in the environment, a .env file, or pass --api-key.',
    )
  }
  const client = createAnthropic({ apiKey: config.ANTHROPIC_API_KEY })
  const timeoutMs = options.timeoutMs ?? config.REQUEST_TIMEOUT_MS
  return new ClaudeVisionModel(client, {
    model: options.model ?? config.LLM_MODEL,
    timeoutMs: timeoutMs > 0 ? timeoutMs : undefined,
  })
}
