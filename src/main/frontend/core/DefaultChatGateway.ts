import type { ChatGateway, GatewayResult } from './ChatGateway'
import type { ConfigService } from '../../services/configService'
import type { ExportOptions, ExportService } from '../../services/exportService'
import type { AbortResult, SessionService, SubmitResult } from '../../services/sessionService'
import type {
  ModelInfo,
  ProviderName,
  Session,
  SessionCreateParams,
  SessionStats,
  SessionSummary
} from '../../types'
import { listAvailableModels } from '../../providers'
import { describeError, toUserError } from '../../errors'
import { createLogger } from '../../logger'
import { createDesktopContext, operationContext } from './OperationContext'

const log = createLogger('Gateway')

/**
 * ChatGateway 默认实现：聚合 Service 层，每个操作在独立的操作上下文中执行
 */
export class DefaultChatGateway implements ChatGateway {
  constructor(
    private readonly sessions: SessionService,
    private readonly exporter: ExportService,
    private readonly config: ConfigService
  ) {}

  // ─── 会话管理 ────────────────────────────────

  createSession(params?: SessionCreateParams): Session {
    return this.run(undefined, () => this.sessions.createSession(params))
  }

  listSessions(): SessionSummary[] {
    return this.sessions.listSessions()
  }

  getSession(sessionId: string): Session {
    return this.sessions.getSession(sessionId)
  }

  renameSession(sessionId: string, title: string): void {
    this.run(sessionId, () => this.sessions.renameSession(sessionId, title))
  }

  deleteSession(sessionId: string): void {
    this.run(sessionId, () => this.sessions.deleteSession(sessionId))
  }

  getSessionStats(sessionId: string): SessionStats {
    return this.sessions.getSessionStats(sessionId)
  }

  // ─── 对话 ────────────────────────────────────

  async prompt(sessionId: string, text: string): Promise<GatewayResult<SubmitResult>> {
    return this.run(sessionId, async (): Promise<GatewayResult<SubmitResult>> => {
      const preview = text.length > 80 ? text.slice(0, 80) + '...' : text
      log.info(`prompt session=${sessionId}: ${preview}`)
      try {
        const result = await this.sessions.submit(sessionId, text)
        return { success: true, result }
      } catch (err) {
        log.warn(`prompt 失败 session=${sessionId}: ${describeError(err)}`)
        return { success: false, error: toUserError(err) }
      }
    })
  }

  abort(sessionId: string): AbortResult {
    return this.run(sessionId, () => this.sessions.abort(sessionId))
  }

  // ─── 运行时调整 ──────────────────────────────

  setModel(sessionId: string, provider: ProviderName, model: string): void {
    this.run(sessionId, () => this.sessions.setSessionModel(sessionId, provider, model))
  }

  setSystemPrompt(sessionId: string, prompt: string): void {
    this.run(sessionId, () => this.sessions.setSystemPrompt(sessionId, prompt))
  }

  listAvailableModels(): ModelInfo[] {
    return listAvailableModels(this.config.configuredProviders())
  }

  // ─── 消息操作 ────────────────────────────────

  clearMessages(sessionId: string): void {
    this.run(sessionId, () => this.sessions.clearMessages(sessionId))
  }

  deleteMessage(sessionId: string, messageId: string): void {
    this.run(sessionId, () => this.sessions.deleteMessage(sessionId, messageId))
  }

  // ─── 导出 / 导入 ─────────────────────────────

  exportMarkdown(sessionId: string, options?: ExportOptions): string {
    return this.run(sessionId, () => this.exporter.exportSessionMarkdown(sessionId, options))
  }

  importMarkdown(markdown: string): Session {
    return this.run(undefined, () => this.exporter.importSessionMarkdown(markdown))
  }

  private run<T>(sessionId: string | undefined, fn: () => T): T {
    return operationContext.run(createDesktopContext(sessionId), fn)
  }
}
