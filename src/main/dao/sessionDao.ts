import { BaseDao } from './database'
import type { SessionRow } from './types'

/**
 * Session DAO：会话表的纯数据访问操作
 */
export class SessionDao extends BaseDao {
  /** 获取所有会话，按更新时间倒序 */
  findAll(): SessionRow[] {
    return this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY updatedAt DESC, createdAt DESC, id DESC')
      .all()
  }

  /** 插入或更新会话 */
  upsert(session: SessionRow): void {
    this.db
      .prepare<SessionRow>(
        `INSERT INTO sessions (id, title, titleSource, provider, model, systemPrompt, createdAt, updatedAt)
         VALUES (@id, @title, @titleSource, @provider, @model, @systemPrompt, @createdAt, @updatedAt)
         ON CONFLICT(id) DO UPDATE SET
           title = excluded.title,
           titleSource = excluded.titleSource,
           provider = excluded.provider,
           model = excluded.model,
           systemPrompt = excluded.systemPrompt,
           updatedAt = excluded.updatedAt`
      )
      .run(session)
  }

  /** 更新时间戳 */
  touch(id: string, updatedAt: number): void {
    this.db
      .prepare<[number, string]>('UPDATE sessions SET updatedAt = ? WHERE id = ?')
      .run(updatedAt, id)
  }

  /** 删除会话（消息由外键级联删除） */
  deleteById(id: string): number {
    return this.db.prepare<[string]>('DELETE FROM sessions WHERE id = ?').run(id).changes
  }
}
