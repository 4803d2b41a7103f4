import type { ChatEvent } from './types'

/** 前端能力声明 */
export interface ChatFrontendCapabilities {
  /** 支持实时流式 delta 事件 (text_delta) */
  streaming?: boolean
}

/** 聊天前端适配器：接收会话事件推送 */
export interface ChatFrontend {
  /** 唯一标识 */
  readonly id: string
  /** 该前端支持的能力 */
  readonly capabilities: ChatFrontendCapabilities
  /** 推送事件到前端 */
  sendEvent(event: ChatEvent): void
  /** 连接是否仍然有效 */
  isAlive(): boolean
}
