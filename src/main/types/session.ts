import type { Message } from './message'
import type { ProviderName } from './provider'

/** 会话运行状态（仅内存，不持久化） */
export type SessionStatus = 'idle' | 'awaiting_response' | 'streaming' | 'error'

/** 标题来源：占位标题 / 自动生成 / 用户重命名 */
export type TitleSource = 'default' | 'generated' | 'user'

/** 会话数据结构 */
export interface Session {
  id: string
  title: string
  titleSource: TitleSource
  provider: ProviderName
  model: string
  systemPrompt: string
  createdAt: number
  /** 最后活动时间 */
  updatedAt: number
  messages: Message[]
  status: SessionStatus
}

/** 会话列表项 */
export interface SessionSummary {
  id: string
  title: string
  createdAt: number
  updatedAt: number
  status: SessionStatus
  model: string
  messageCount: number
}

/** 创建会话参数 */
export interface SessionCreateParams {
  title?: string
  provider?: ProviderName
  model?: string
  systemPrompt?: string
}

/** 会话统计 */
export interface SessionStats {
  messageCount: number
  userMessages: number
  assistantMessages: number
  totalCharacters: number
  createdAt: number
  updatedAt: number
}
