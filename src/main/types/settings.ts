import type { ProviderName } from './provider'

/** 已解析的全局配置快照 */
export interface AppConfig {
  general: {
    defaultProvider: ProviderName
    language: string
  }
  generation: {
    temperature: number
    maxTokens: number
    stream: boolean
  }
  session: {
    autoSave: boolean
    autoRename: boolean
    /** 每轮发送给模型的最近消息条数（系统提示另计） */
    maxContextMessages: number
  }
  request: {
    timeoutMs: number
    maxRetries: number
    retryBaseDelayMs: number
  }
}
