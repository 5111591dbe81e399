import Anthropic from '@anthropic-ai/sdk'

export { Anthropic }

export type ContentBlock = Anthropic.ContentBlock
export type ImageBlockParam = Anthropic.ImageBlockParam
export type TextBlock = Anthropic.TextBlock
export type TextBlockParam = Anthropic.TextBlockParam
