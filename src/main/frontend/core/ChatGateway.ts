import type { UserError } from '../../errors'
import type { ExportOptions } from '../../services/exportService'
import type { AbortResult, SubmitResult } from '../../services/sessionService'
import type {
  ModelInfo,
  ProviderName,
  Session,
  SessionCreateParams,
  SessionStats,
  SessionSummary
} from '../../types'

/** 异步操作结果：失败时携带展示层可用的错误 */
export type GatewayResult<T> = { success: true; result: T } | { success: false; error: UserError }

/**
 * 上行操作接口：展示层 → 会话核心的统一入口
 *
 * 同步操作失败时抛出 ChatError（展示层用 toUserError 转换）；
 * prompt 为异步长操作，结果以 GatewayResult 返回，过程通过 ChatEvent 推送。
 */
export interface ChatGateway {
  // ─── 会话管理 ────────────────────────────────

  createSession(params?: SessionCreateParams): Session
  listSessions(): SessionSummary[]
  getSession(sessionId: string): Session
  renameSession(sessionId: string, title: string): void
  deleteSession(sessionId: string): void
  getSessionStats(sessionId: string): SessionStats

  // ─── 对话 ────────────────────────────────────

  /** 发送用户消息并等待本轮生成结束 */
  prompt(sessionId: string, text: string): Promise<GatewayResult<SubmitResult>>

  /** 中止当前生成 */
  abort(sessionId: string): AbortResult

  // ─── 运行时调整 ──────────────────────────────

  /** 切换模型 */
  setModel(sessionId: string, provider: ProviderName, model: string): void

  /** 修改系统提示 */
  setSystemPrompt(sessionId: string, prompt: string): void

  /** 可选模型（仅已配置 API Key 的提供商） */
  listAvailableModels(): ModelInfo[]

  // ─── 消息操作 ────────────────────────────────

  /** 清空会话所有消息 */
  clearMessages(sessionId: string): void

  /** 删除单条消息 */
  deleteMessage(sessionId: string, messageId: string): void

  // ─── 导出 / 导入 ─────────────────────────────

  exportMarkdown(sessionId: string, options?: ExportOptions): string
  importMarkdown(markdown: string): Session
}
