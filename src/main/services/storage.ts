import type { DatabaseManager } from '../dao/database'
import { SessionDao } from '../dao/sessionDao'
import { MessageDao } from '../dao/messageDao'
import type { MessageRow, SessionRow } from '../dao/types'
import { PersistenceError, describeError } from '../errors'
import { t } from '../i18n'
import { createLogger } from '../logger'
import { isProviderName } from '../types'
import type { Message, MessageRole, MessageState, ProviderName, Session, TitleSource } from '../types'

const log = createLogger('Storage')

const ROLES: readonly MessageRole[] = ['user', 'assistant', 'system']
const STATES: readonly MessageState[] = ['complete', 'aborted']
const TITLE_SOURCES: readonly TitleSource[] = ['default', 'generated', 'user']

function pick<T extends string>(allowed: readonly T[], value: string, fallback: T): T {
  return allowed.find((v) => v === value) ?? fallback
}

/**
 * 存储服务：会话与消息的持久化
 * 每次写入是单条语句或一个事务；数据库异常统一包装为 PersistenceError
 */
export class StorageService {
  private readonly sessionDao: SessionDao
  private readonly messageDao: MessageDao

  constructor(
    private readonly databaseManager: DatabaseManager,
    private readonly fallbackProvider: () => ProviderName = () => 'deepseek'
  ) {
    this.sessionDao = new SessionDao(databaseManager)
    this.messageDao = new MessageDao(databaseManager)
  }

  /** 保存会话元数据（不含消息） */
  saveSession(session: Session): void {
    this.guard('saveSession', () => this.sessionDao.upsert(toSessionRow(session)))
  }

  /** 加载全部会话（含消息），状态一律为 idle */
  loadAllSessions(): Session[] {
    return this.guard('loadAllSessions', () =>
      this.sessionDao.findAll().map((row) => this.fromSessionRow(row, this.messageDao.findBySessionId(row.id)))
    )
  }

  /** 写入消息，同时写入所属会话（同一事务；会话行不存在时一并创建） */
  appendMessage(session: Session, message: Message): void {
    this.guard('appendMessage', () =>
      this.databaseManager.transaction(() => {
        this.sessionDao.upsert(toSessionRow(session))
        this.messageDao.upsert(toMessageRow(message))
      })
    )
  }

  /** 用内存状态整体覆盖会话：元数据 + 已结束的消息（同一事务） */
  syncSession(session: Session): void {
    this.guard('syncSession', () =>
      this.databaseManager.transaction(() => {
        this.sessionDao.upsert(toSessionRow(session))
        this.messageDao.deleteBySessionId(session.id)
        for (const message of session.messages) {
          if (message.state !== 'partial') this.messageDao.upsert(toMessageRow(message))
        }
      })
    )
  }

  /** 删除单条消息 */
  deleteMessage(messageId: string): void {
    this.guard('deleteMessage', () => {
      this.messageDao.deleteById(messageId)
    })
  }

  /** 清空会话消息 */
  clearMessages(sessionId: string, updatedAt: number): void {
    this.guard('clearMessages', () =>
      this.databaseManager.transaction(() => {
        this.messageDao.deleteBySessionId(sessionId)
        this.sessionDao.touch(sessionId, updatedAt)
      })
    )
  }

  /** 删除会话及其消息（同一事务） */
  deleteSession(sessionId: string): void {
    this.guard('deleteSession', () =>
      this.databaseManager.transaction(() => {
        this.messageDao.deleteBySessionId(sessionId)
        this.sessionDao.deleteById(sessionId)
      })
    )
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      log.error(`${operation} 失败: ${describeError(err)}`)
      throw new PersistenceError(t('errors.persistence', { detail: describeError(err) }), { cause: err })
    }
  }

  private fromSessionRow(row: SessionRow, messages: MessageRow[]): Session {
    return {
      id: row.id,
      title: row.title,
      titleSource: pick(TITLE_SOURCES, row.titleSource, 'default'),
      provider: isProviderName(row.provider) ? row.provider : this.fallbackProvider(),
      model: row.model,
      systemPrompt: row.systemPrompt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      messages: messages.map(fromMessageRow),
      status: 'idle'
    }
  }
}

function toSessionRow(session: Session): SessionRow {
  return {
    id: session.id,
    title: session.title,
    titleSource: session.titleSource,
    provider: session.provider,
    model: session.model,
    systemPrompt: session.systemPrompt,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt
  }
}

function toMessageRow(message: Message): MessageRow {
  return {
    id: message.id,
    sessionId: message.sessionId,
    role: message.role,
    content: message.content,
    state: message.state,
    model: message.model,
    createdAt: message.createdAt
  }
}

function fromMessageRow(row: MessageRow): Message {
  return {
    id: row.id,
    sessionId: row.sessionId,
    role: pick(ROLES, row.role, 'user'),
    content: row.content,
    state: pick(STATES, row.state, 'complete'),
    model: row.model,
    createdAt: row.createdAt
  }
}
