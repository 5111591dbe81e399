import { Anthropic as _Anthropic } from '../../L1-infra/ai/anthropic.js'

export type { Anthropic } from '../../L1-infra/ai/anthropic.js'

export function createAnthropic(...args: ConstructorParameters<typeof _Anthropic>): InstanceType<typeof _Anthropic> {
  return new _Anthropic(...args)
}
