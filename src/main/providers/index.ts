import type { ModelInfo, ProviderConfig, ProviderName } from '../types'
import { modelsOf } from './catalog'
import { DeepSeekAdapter } from './deepseek'
import { OpenRouterAdapter } from './openrouter'
import type { ProviderAdapter, StreamFn } from './types'

export * from './types'
export { BUILTIN_PROVIDERS, modelsOf } from './catalog'
export { classifyProviderError } from './errors'
export { OpenAICompatibleAdapter } from './openaiCompatible'
export { DeepSeekAdapter, OpenRouterAdapter }

/** 根据提供商名创建适配器 */
export function createProviderAdapter(config: ProviderConfig, streamFn?: StreamFn): ProviderAdapter {
  switch (config.name) {
    case 'deepseek':
      return new DeepSeekAdapter(config, streamFn)
    case 'openrouter':
      return new OpenRouterAdapter(config, streamFn)
  }
}

/** 可用模型：仅列出已配置 API Key 的提供商 */
export function listAvailableModels(configured: ProviderName[]): ModelInfo[] {
  return configured.flatMap((provider) => modelsOf(provider))
}
