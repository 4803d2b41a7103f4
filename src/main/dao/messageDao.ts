import { BaseDao } from './database'
import type { MessageRow } from './types'

/**
 * Message DAO：消息表的纯数据访问操作
 */
export class MessageDao extends BaseDao {
  /** 获取某个会话的所有消息，按时间升序 */
  findBySessionId(sessionId: string): MessageRow[] {
    return this.db
      .prepare<[string], MessageRow>('SELECT * FROM messages WHERE sessionId = ? ORDER BY createdAt ASC, id ASC')
      .all(sessionId)
  }

  /** 插入或替换消息（同一条消息只保留最后一次写入） */
  upsert(message: MessageRow): void {
    this.db
      .prepare<MessageRow>(
        `INSERT OR REPLACE INTO messages (id, sessionId, role, content, state, model, createdAt)
         VALUES (@id, @sessionId, @role, @content, @state, @model, @createdAt)`
      )
      .run(message)
  }

  /** 删除单条消息 */
  deleteById(id: string): number {
    return this.db.prepare<[string]>('DELETE FROM messages WHERE id = ?').run(id).changes
  }

  /** 删除某个会话的所有消息 */
  deleteBySessionId(sessionId: string): number {
    return this.db.prepare<[string]>('DELETE FROM messages WHERE sessionId = ?').run(sessionId).changes
  }
}
