import type { ModelInfo, ProviderName } from '../types'

/** 内置提供商描述 */
export interface ProviderPreset {
  name: ProviderName
  /** 展示名 */
  label: string
  baseUrl: string
  defaultModel: string
  /** 内置模型列表：[modelId, 展示名] */
  models: ReadonlyArray<readonly [string, string]>
}

/** 内置提供商与模型目录 */
export const BUILTIN_PROVIDERS: Record<ProviderName, ProviderPreset> = {
  deepseek: {
    name: 'deepseek',
    label: 'DeepSeek',
    baseUrl: 'https://api.deepseek.com',
    defaultModel: 'deepseek-chat',
    models: [
      ['deepseek-chat', 'DeepSeek Chat'],
      ['deepseek-reasoner', 'DeepSeek Reasoner']
    ]
  },
  openrouter: {
    name: 'openrouter',
    label: 'OpenRouter',
    baseUrl: 'https://openrouter.ai/api/v1',
    defaultModel: 'deepseek/deepseek-chat-v3-0324:free',
    models: [
      ['deepseek/deepseek-r1-0528:free', 'DeepSeek R1 (free)'],
      ['deepseek/deepseek-chat-v3-0324:free', 'DeepSeek V3 (free)'],
      ['anthropic/claude-sonnet-4', 'Claude Sonnet 4'],
      ['anthropic/claude-3.7-sonnet', 'Claude 3.7 Sonnet'],
      ['google/gemini-2.5-pro-preview', 'Gemini 2.5 Pro Preview'],
      ['openai/chatgpt-4o-latest', 'ChatGPT-4o'],
      ['x-ai/grok-3', 'Grok 3']
    ]
  }
}

/** 某提供商的模型目录 */
export function modelsOf(provider: ProviderName): ModelInfo[] {
  return BUILTIN_PROVIDERS[provider].models.map(([id, label]) => ({ provider, id, label }))
}

/** 推理模型（按 id 识别） */
export function isReasoningModel(modelId: string): boolean {
  return /reasoner|-r1/.test(modelId)
}
