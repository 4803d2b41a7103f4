import { v7 as uuidv7 } from 'uuid'
import type { ConfigService } from './configService'
import type { StorageService } from './storage'
import type { StreamHandle, StreamOrchestrator, TurnResult } from './streamOrchestrator'
import type { TitleService } from './titleService'
import type { AdapterResolver, ProviderAdapter } from '../providers/types'
import type { ChatFrontendRegistry } from '../frontend/core/ChatFrontendRegistry'
import type { ChatEvent } from '../frontend/core/types'
import type {
  ChatHistoryEntry,
  Message,
  MessageRole,
  ProviderName,
  Session,
  SessionCreateParams,
  SessionStats,
  SessionSummary,
  TitleSource,
  TurnOutcome
} from '../types'
import { BUILTIN_PROVIDERS } from '../providers/catalog'
import { ConfigError, InvalidStateError, NotFoundError, describeError, toUserError } from '../errors'
import { t } from '../i18n'
import { createLogger } from '../logger'

const log = createLogger('Session')

export interface SessionServiceDeps {
  storage: StorageService
  config: ConfigService
  orchestrator: StreamOrchestrator
  adapters: AdapterResolver
  frontends: ChatFrontendRegistry
  titles: TitleService
}

/** 一轮生成的结果 */
export interface SubmitResult extends TurnResult {
  /** 最终保存的 assistant 消息；空内容的中止回复为 null */
  message: Message | null
}

export interface AbortResult {
  /** 是否存在正在进行的生成 */
  aborted: boolean
  savedMessage: Message | null
}

/** 导入的会话内容 */
export interface ImportedSession {
  title: string
  provider?: ProviderName
  model?: string
  systemPrompt: string
  messages: Array<{ role: MessageRole; content: string; createdAt?: number }>
}

interface ActiveTurn {
  handle: StreamHandle
  messageId: string
}

/**
 * 会话服务：会话状态的唯一持有者
 *
 * 状态机：idle → awaiting_response → streaming → idle
 *         生成中取消 → idle，出错 → error
 * 写库失败不影响内存状态：失败的写入按会话排队，下次写入该会话前重试
 */
export class SessionService {
  private readonly sessions = new Map<string, Session>()
  /** 正在进行的生成：sessionId → 句柄 */
  private readonly turns = new Map<string, ActiveTurn>()
  /** 正在删除的会话（取消生成时不再写库） */
  private readonly deleting = new Set<string>()
  /** 写库失败待重试的操作：sessionId → 写入队列 */
  private readonly pendingWrites = new Map<string, Array<() => void>>()

  constructor(private readonly deps: SessionServiceDeps) {}

  // ─── 启动 ────────────────────────────────────

  /** 从数据库加载所有会话 */
  load(): number {
    const loaded = this.deps.storage.loadAllSessions()
    this.sessions.clear()
    for (const session of loaded) {
      this.sessions.set(session.id, session)
    }
    log.info(`已加载 ${loaded.length} 个会话`)
    return loaded.length
  }

  /** 没有任何会话时创建默认会话；返回最近活动的会话 */
  ensureDefaultSession(): Session {
    const [latest] = this.listSessions()
    if (latest) return this.getSession(latest.id)
    return this.createSession()
  }

  // ─── 会话 CRUD ───────────────────────────────

  /** 创建会话（立即保存） */
  createSession(params?: SessionCreateParams): Session {
    const provider = params?.provider ?? this.deps.config.get().general.defaultProvider
    const customTitle = params?.title?.trim()
    const now = Date.now()
    const session: Session = {
      id: uuidv7(),
      title: customTitle || t('session.defaultTitle'),
      titleSource: customTitle ? 'user' : 'default',
      provider,
      model: params?.model?.trim() || this.deps.config.getProviderConfig(provider).defaultModel,
      systemPrompt: params?.systemPrompt ?? '',
      createdAt: now,
      updatedAt: now,
      messages: [],
      status: 'idle'
    }
    this.sessions.set(session.id, session)
    this.persistSession(session)
    log.info(`创建会话 ${session.id} provider=${provider} model=${session.model}`)
    return this.snapshot(session)
  }

  /** 会话列表：按最后活动时间倒序 */
  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values())
      .sort(
        (a, b) =>
          b.updatedAt - a.updatedAt || b.createdAt - a.createdAt || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
      )
      .map((s) => ({
        id: s.id,
        title: s.title,
        createdAt: s.createdAt,
        updatedAt: s.updatedAt,
        status: s.status,
        model: s.model,
        messageCount: s.messages.length
      }))
  }

  /** 获取会话副本；不存在时抛出 NotFoundError */
  getSession(id: string): Session {
    return this.snapshot(this.require(id))
  }

  /** 获取会话副本；不存在时返回 undefined */
  findSession(id: string): Session | undefined {
    const session = this.sessions.get(id)
    return session ? this.snapshot(session) : undefined
  }

  /** 用户重命名（之后不再自动生成标题） */
  renameSession(id: string, title: string): void {
    const session = this.require(id)
    const trimmed = title.trim()
    if (!trimmed) {
      throw new InvalidStateError(t('errors.emptyTitle'))
    }
    this.applyTitle(session, trimmed, 'user')
  }

  /** 切换会话模型（下一轮生效） */
  setSessionModel(id: string, provider: ProviderName, model: string): void {
    const session = this.require(id)
    session.provider = provider
    session.model = model.trim() || this.deps.config.getProviderConfig(provider).defaultModel
    session.updatedAt = Date.now()
    this.persistSession(session)
    log.info(`切换模型 session=${id} provider=${provider} model=${session.model}`)
  }

  /** 修改会话系统提示 */
  setSystemPrompt(id: string, prompt: string): void {
    const session = this.require(id)
    session.systemPrompt = prompt
    session.updatedAt = Date.now()
    this.persistSession(session)
  }

  /**
   * 删除会话
   * 先取消进行中的生成（取消结果不写库），再删除数据库记录，最后移除内存状态
   */
  deleteSession(id: string): void {
    this.require(id)
    this.deleting.add(id)
    try {
      this.turns.get(id)?.handle.cancel()
      this.pendingWrites.delete(id)
      if (this.deps.config.get().session.autoSave) {
        this.deps.storage.deleteSession(id)
      }
    } catch (err) {
      this.deleting.delete(id)
      throw err
    }
    this.sessions.delete(id)
    this.turns.delete(id)
    this.deleting.delete(id)
    log.info(`删除会话 ${id}`)
    this.emit({ type: 'session_deleted', sessionId: id })
  }

  /** 删除没有任何消息的空闲会话，返回删除数量 */
  cleanupEmptySessions(): number {
    const empty = Array.from(this.sessions.values()).filter(
      (s) => s.messages.length === 0 && s.status === 'idle' && !this.turns.has(s.id)
    )
    for (const session of empty) {
      this.deleteSession(session.id)
    }
    if (empty.length > 0) log.info(`清理空会话 ${empty.length} 个`)
    return empty.length
  }

  /** 会话统计 */
  getSessionStats(id: string): SessionStats {
    const session = this.require(id)
    return {
      messageCount: session.messages.length,
      userMessages: session.messages.filter((m) => m.role === 'user').length,
      assistantMessages: session.messages.filter((m) => m.role === 'assistant').length,
      totalCharacters: session.messages.reduce((sum, m) => sum + Array.from(m.content).length, 0),
      createdAt: session.createdAt,
      updatedAt: session.updatedAt
    }
  }

  // ─── 消息 ────────────────────────────────────

  /** 追加用户消息（立即保存）；生成中不允许 */
  appendUserMessage(id: string, text: string): string {
    const session = this.require(id)
    this.assertIdle(session)
    if (!text.trim()) {
      throw new InvalidStateError(t('errors.emptyMessage'))
    }
    const message: Message = {
      id: uuidv7(),
      sessionId: id,
      role: 'user',
      content: text,
      state: 'complete',
      model: '',
      createdAt: this.nextTimestamp(session)
    }
    session.messages.push(message)
    session.updatedAt = message.createdAt
    if (session.status === 'error') session.status = 'idle'
    this.persistMessage(session, message)
    return message.id
  }

  /** 创建生成中的 assistant 消息（不保存），会话进入 awaiting_response */
  beginAssistantMessage(id: string): string {
    const session = this.require(id)
    this.assertIdle(session)
    const message: Message = {
      id: uuidv7(),
      sessionId: id,
      role: 'assistant',
      content: '',
      state: 'partial',
      model: session.model,
      createdAt: this.nextTimestamp(session)
    }
    session.messages.push(message)
    session.status = 'awaiting_response'
    return message.id
  }

  /** 追加一块生成文本；消息已结束时忽略 */
  applyDelta(id: string, messageId: string, chunk: string): void {
    const session = this.sessions.get(id)
    const message = session?.messages.find((m) => m.id === messageId)
    if (!session || !message || message.state !== 'partial') {
      log.warn(`忽略迟到的增量 session=${id} message=${messageId}`)
      return
    }
    message.content += chunk
    if (session.status === 'awaiting_response') session.status = 'streaming'
    this.emit({ type: 'text_delta', sessionId: id, messageId, delta: chunk })
  }

  /**
   * 结束生成中的消息并保存一次
   * error 视为中止；空内容的中止回复直接丢弃；重复调用无效果
   */
  finalizeMessage(id: string, messageId: string, outcome: TurnOutcome): Message | null {
    const session = this.sessions.get(id)
    const message = session?.messages.find((m) => m.id === messageId)
    if (!session || !message || message.state !== 'partial') return null

    message.state = outcome === 'complete' ? 'complete' : 'aborted'
    session.status = outcome === 'error' ? 'error' : 'idle'
    if (this.turns.get(id)?.messageId === messageId) this.turns.delete(id)

    let saved: Message | null = null
    if (message.state === 'aborted' && message.content === '') {
      session.messages = session.messages.filter((m) => m.id !== messageId)
    } else {
      session.updatedAt = Math.max(Date.now(), message.createdAt)
      if (!this.deleting.has(id)) this.persistMessage(session, message)
      saved = { ...message }
    }

    log.info(`生成结束 session=${id} outcome=${outcome} chars=${message.content.length}`)
    this.emit({ type: 'turn_end', sessionId: id, messageId, outcome, ...(saved ? { message: saved } : {}) })
    return saved
  }

  /** 删除单条消息 */
  deleteMessage(id: string, messageId: string): void {
    const session = this.require(id)
    const message = session.messages.find((m) => m.id === messageId)
    if (!message) {
      throw new NotFoundError(t('errors.messageNotFound', { id: messageId }))
    }
    if (message.state === 'partial') {
      throw new InvalidStateError(t('errors.turnInFlight'))
    }
    session.messages = session.messages.filter((m) => m.id !== messageId)
    this.persist(id, () => this.deps.storage.deleteMessage(messageId))
  }

  /** 清空会话消息；生成中不允许 */
  clearMessages(id: string): void {
    const session = this.require(id)
    this.assertIdle(session)
    session.messages = []
    session.status = 'idle'
    session.updatedAt = Date.now()
    const updatedAt = session.updatedAt
    this.persist(id, () => this.deps.storage.clearMessages(id, updatedAt))
  }

  // ─── 生成 ────────────────────────────────────

  /**
   * 完整的一轮对话：检查配置 → 追加用户消息 → 流式生成 → 保存 → 生成标题
   * 调用方可 await 拿到本轮结果；取消或出错都以结果返回而非抛出
   */
  async submit(id: string, text: string): Promise<SubmitResult> {
    const session = this.require(id)
    this.assertIdle(session)
    const providerConfig = this.deps.config.getProviderConfig(session.provider)
    if (!providerConfig.apiKey) {
      throw new ConfigError(t('errors.apiKeyMissing', { provider: BUILTIN_PROVIDERS[session.provider].label }))
    }
    this.appendUserMessage(id, text)
    const adapter = this.deps.adapters(session.provider)
    return this.runTurn(session, adapter)
  }

  /** 取消进行中的生成，返回已保存的部分回复 */
  abort(id: string): AbortResult {
    this.require(id)
    const turn = this.turns.get(id)
    if (!turn) return { aborted: false, savedMessage: null }
    turn.handle.cancel()
    const saved = this.sessions.get(id)?.messages.find((m) => m.id === turn.messageId)
    log.info(`已取消生成 session=${id}`)
    return { aborted: true, savedMessage: saved ? { ...saved } : null }
  }

  /** 取消所有进行中的生成（退出时） */
  abortAll(): number {
    const active = Array.from(this.turns.values())
    for (const turn of active) {
      turn.handle.cancel()
    }
    return active.length
  }

  // ─── 导入 ────────────────────────────────────

  /** 从导出文件内容创建新会话 */
  importSession(data: ImportedSession): Session {
    const session = this.createSession({
      title: data.title,
      provider: data.provider,
      model: data.model,
      systemPrompt: data.systemPrompt
    })
    const target = this.require(session.id)
    for (const entry of data.messages) {
      const last = target.messages[target.messages.length - 1]
      const floor = last ? last.createdAt + 1 : target.createdAt
      const message: Message = {
        id: uuidv7(),
        sessionId: target.id,
        role: entry.role,
        content: entry.content,
        state: 'complete',
        model: entry.role === 'assistant' ? target.model : '',
        createdAt: Math.max(entry.createdAt ?? floor, floor)
      }
      target.messages.push(message)
      target.updatedAt = Math.max(target.updatedAt, message.createdAt)
      this.persistMessage(target, message)
    }
    log.info(`导入会话 ${target.id} messages=${target.messages.length}`)
    return this.snapshot(target)
  }

  // ─── 持久化 ──────────────────────────────────

  /**
   * 把内存中的所有会话整体写入数据库（autoSave 重新开启时）
   * 关闭期间新建或改动过的会话以内存状态为准
   */
  persistAll(): number {
    if (!this.deps.config.get().session.autoSave) return 0
    for (const session of this.sessions.values()) {
      const id = session.id
      this.persist(id, () => {
        const current = this.sessions.get(id)
        if (current) this.deps.storage.syncSession(current)
      })
    }
    log.info(`已同步 ${this.sessions.size} 个会话到数据库`)
    return this.sessions.size
  }

  /** 重试所有待写入的操作，返回仍失败的会话数 */
  flushPendingWrites(): number {
    let failed = 0
    for (const id of Array.from(this.pendingWrites.keys())) {
      if (!this.flush(id)) failed++
    }
    return failed
  }

  // ─── 内部 ────────────────────────────────────

  private async runTurn(session: Session, adapter: ProviderAdapter): Promise<SubmitResult> {
    const id = session.id
    const messageId = this.beginAssistantMessage(id)
    this.emit({ type: 'turn_start', sessionId: id, messageId })

    const generation = this.deps.config.get().generation
    let saved: Message | null = null
    const handle = this.deps.orchestrator.startTurn(
      {
        sessionId: id,
        request: {
          model: session.model,
          messages: this.buildHistory(session),
          temperature: generation.temperature,
          maxTokens: generation.maxTokens
        },
        stream: generation.stream
      },
      adapter,
      {
        onDelta: (chunk) => this.applyDelta(id, messageId, chunk),
        onComplete: () => {
          saved = this.finalizeMessage(id, messageId, 'complete')
        },
        onError: (error) => {
          saved = this.finalizeMessage(id, messageId, 'error')
          this.emit({ type: 'error', sessionId: id, kind: error.kind, error: error.message })
        },
        onCancelled: () => {
          saved = this.finalizeMessage(id, messageId, 'aborted')
        }
      }
    )
    this.turns.set(id, { handle, messageId })

    const result = await handle.done
    if (result.outcome === 'complete') {
      await this.generateTitle(id)
    }
    return { ...result, message: saved }
  }

  /** 发送给模型的历史：系统提示 + 最近 maxContextMessages 条已结束的消息 */
  private buildHistory(session: Session): ChatHistoryEntry[] {
    const history: ChatHistoryEntry[] = []
    if (session.systemPrompt.trim()) {
      history.push({ role: 'system', content: session.systemPrompt })
    }
    const finished = session.messages.filter((m) => m.state !== 'partial' && m.content)
    const limit = this.deps.config.get().session.maxContextMessages
    for (const message of finished.slice(-limit)) {
      history.push({ role: message.role, content: message.content })
    }
    return history
  }

  /** 首轮回复后自动生成标题；用户在此期间重命名则放弃 */
  private async generateTitle(id: string): Promise<void> {
    const session = this.sessions.get(id)
    if (!session || this.deleting.has(id)) return
    const title = await this.deps.titles.maybeGenerateTitle(this.snapshot(session))
    const current = this.sessions.get(id)
    if (!title || !current || current.titleSource !== 'default' || this.deleting.has(id)) return
    this.applyTitle(current, title, 'generated')
  }

  private applyTitle(session: Session, title: string, source: TitleSource): void {
    session.title = title
    session.titleSource = source
    session.updatedAt = Date.now()
    this.persistSession(session)
    this.emit({ type: 'title_updated', sessionId: session.id, title, titleSource: source })
  }

  private persistSession(session: Session): void {
    const id = session.id
    this.persist(id, () => {
      const current = this.sessions.get(id)
      if (current) this.deps.storage.saveSession(current)
    })
  }

  private persistMessage(session: Session, message: Message): void {
    const id = session.id
    const snapshot = { ...message }
    this.persist(id, () => {
      const current = this.sessions.get(id)
      if (current) this.deps.storage.appendMessage(current, snapshot)
    })
  }

  /** 排队写入并立即尝试落库；autoSave 关闭时不写库 */
  private persist(sessionId: string, write: () => void): void {
    if (!this.deps.config.get().session.autoSave) return
    const queue = this.pendingWrites.get(sessionId) ?? []
    queue.push(write)
    this.pendingWrites.set(sessionId, queue)
    this.flush(sessionId)
  }

  /** 按顺序执行待写入操作，遇到失败停止（保留失败项等待下次重试） */
  private flush(sessionId: string): boolean {
    const queue = this.pendingWrites.get(sessionId)
    if (!queue) return true
    while (queue.length > 0) {
      try {
        queue[0]()
      } catch (err) {
        log.error(`写库失败，将在下次保存时重试 session=${sessionId} pending=${queue.length}: ${describeError(err)}`)
        const { kind, message } = toUserError(err)
        this.emit({ type: 'error', sessionId, kind, error: message })
        return false
      }
      queue.shift()
    }
    this.pendingWrites.delete(sessionId)
    return true
  }

  /** 同一会话内消息时间严格递增 */
  private nextTimestamp(session: Session): number {
    const last = session.messages[session.messages.length - 1]
    return last ? Math.max(Date.now(), last.createdAt + 1) : Date.now()
  }

  private assertIdle(session: Session): void {
    if (session.status === 'awaiting_response' || session.status === 'streaming' || this.turns.has(session.id)) {
      throw new InvalidStateError(t('errors.turnInFlight'))
    }
  }

  private require(id: string): Session {
    const session = this.sessions.get(id)
    if (!session) {
      throw new NotFoundError(t('errors.sessionNotFound', { id }))
    }
    return session
  }

  private snapshot(session: Session): Session {
    return { ...session, messages: session.messages.map((m) => ({ ...m })) }
  }

  private emit(event: ChatEvent): void {
    this.deps.frontends.broadcast(event)
  }
}
