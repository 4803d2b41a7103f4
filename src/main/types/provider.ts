import type { MessageRole } from './message'

/** 内置提供商（封闭集合） */
export const PROVIDER_NAMES = ['deepseek', 'openrouter'] as const
export type ProviderName = (typeof PROVIDER_NAMES)[number]

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}

/** 生成参数 */
export interface GenerationParams {
  temperature: number
  maxTokens: number
  stream: boolean
}

/** 提供商配置（apiKey 为明文，仅在内存中） */
export interface ProviderConfig {
  name: ProviderName
  baseUrl: string
  apiKey: string
  defaultModel: string
  generation: GenerationParams
}

/** 模型目录条目 */
export interface ModelInfo {
  provider: ProviderName
  id: string
  label: string
}

/** 发送给模型的历史条目 */
export interface ChatHistoryEntry {
  role: MessageRole
  content: string
}

/** 一次模型请求 */
export interface ChatRequest {
  model: string
  messages: ChatHistoryEntry[]
  temperature: number
  maxTokens: number
}

/** 非流式请求的结果 */
export interface ProviderResponse {
  content: string
  model: string
  finishReason: string
}
