/**
 * ChatEvent：后端 → 前端通信协议
 *
 * 判别联合类型，每个变体只包含该事件所需字段。
 * 作为会话核心与展示层之间的唯一事件契约。
 */

import type { ErrorKind } from '../../errors'
import type { Message, TitleSource, TurnOutcome } from '../../types'

// ─── 基础 ──────────────────────────────────────────────

interface ChatEventBase {
  sessionId: string
}

// ─── 流式生成 ──────────────────────────────────────────

/** 开始生成（assistant 占位消息已创建） */
export interface ChatTurnStartEvent extends ChatEventBase {
  type: 'turn_start'
  messageId: string
}

/** 文本增量 */
export interface ChatTextDeltaEvent extends ChatEventBase {
  type: 'text_delta'
  messageId: string
  delta: string
}

/** 本轮生成结束 */
export interface ChatTurnEndEvent extends ChatEventBase {
  type: 'turn_end'
  messageId: string
  outcome: TurnOutcome
  /** 最终保存的 assistant 消息（空内容的中止回复不保存） */
  message?: Message
}

// ─── 会话变更 ──────────────────────────────────────────

/** 标题变更（自动生成或用户重命名） */
export interface ChatTitleUpdatedEvent extends ChatEventBase {
  type: 'title_updated'
  title: string
  titleSource: TitleSource
}

/** 会话已删除 */
export interface ChatSessionDeletedEvent extends ChatEventBase {
  type: 'session_deleted'
}

// ─── 错误 ──────────────────────────────────────────────

/** 错误事件 */
export interface ChatErrorEvent extends ChatEventBase {
  type: 'error'
  kind: ErrorKind
  /** 简短的本地化文案 */
  error: string
}

// ─── 联合类型 ──────────────────────────────────────────

export type ChatEvent =
  | ChatTurnStartEvent
  | ChatTextDeltaEvent
  | ChatTurnEndEvent
  | ChatTitleUpdatedEvent
  | ChatSessionDeletedEvent
  | ChatErrorEvent
