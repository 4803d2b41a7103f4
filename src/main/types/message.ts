/** 消息角色 */
export type MessageRole = 'user' | 'assistant' | 'system'

/** 消息状态：生成中 / 完成 / 被中止 */
export type MessageState = 'partial' | 'complete' | 'aborted'

/** 一轮生成的结果 */
export type TurnOutcome = 'complete' | 'aborted' | 'error'

/** 消息数据结构 */
export interface Message {
  id: string
  sessionId: string
  role: MessageRole
  content: string
  state: MessageState
  /** 生成该回复的模型（仅 assistant） */
  model: string
  createdAt: number
}
